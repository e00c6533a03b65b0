/**
 * Routing decision taken for a slug before the page itself is resolved.
 *
 * - `redirect`: send visitors to another location
 * - `notice`: show a fixed message instead of the page
 */
export type SlugOverride =
    | { type: 'redirect'; slug: string; redirectTo: string }
    | { type: 'notice'; slug: string; message: string };
