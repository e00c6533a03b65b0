const EMBED_TYPES = ['track', 'playlist', 'album', 'episode', 'show'] as const;

export type EmbedType = (typeof EMBED_TYPES)[number];

const TYPE_PATTERN = EMBED_TYPES.join('|');

const WEB_LINK = new RegExp(
    `^(?:https?://)?open\\.spotify\\.com/(?:intl-[a-z]{2}(?:-[a-z]{2})?/)?(?:embed/)?(${TYPE_PATTERN})/([A-Za-z0-9]+)(?:[/?#].*)?$`,
    'i'
);

const URI = new RegExp(`^spotify:(${TYPE_PATTERN}):([A-Za-z0-9]+)$`, 'i');

/**
 * Build the embeddable player link for a resource.
 */
export function buildEmbedUrl(type: EmbedType, id: string): string {
    return `https://open.spotify.com/embed/${type}/${id}`;
}

function isEmbedType(value: string): value is EmbedType {
    return EMBED_TYPES.some(type => type === value);
}

/**
 * Map a user-supplied music link to its embeddable form.
 *
 * Accepts share links (with or without a locale segment, an `embed/` segment
 * or a query string) and `spotify:` URIs. Anything else comes back unchanged,
 * so the function is idempotent.
 *
 * @example
 * normalizeEmbedUrl('https://open.spotify.com/intl-pt/track/4uLU6hMCjMI75M1A2tKUQC?si=abc');
 * // 'https://open.spotify.com/embed/track/4uLU6hMCjMI75M1A2tKUQC'
 */
export function normalizeEmbedUrl(input: string): string {
    const value = input.trim();
    const match = WEB_LINK.exec(value) ?? URI.exec(value);
    if (!match) {
        return input;
    }

    const type = match[1].toLowerCase();
    if (!isEmbedType(type)) {
        return input;
    }
    return buildEmbedUrl(type, match[2]);
}
