import type { IPageFields, PageAspectRatio, PageFontSize, PageFontStyle, PageSection, PageTheme } from '@keepsake/types';

export const PAGE_THEMES = ['classic', 'romantic', 'minimal', 'dark'] as const satisfies readonly PageTheme[];
export const PAGE_FONT_STYLES = ['serif', 'sans', 'script', 'mono'] as const satisfies readonly PageFontStyle[];
export const PAGE_FONT_SIZES = ['small', 'medium', 'large'] as const satisfies readonly PageFontSize[];
export const PAGE_ASPECT_RATIOS = ['square', 'story'] as const satisfies readonly PageAspectRatio[];
export const PAGE_SECTIONS = ['message', 'gallery', 'music', 'timeline'] as const satisfies readonly PageSection[];

/**
 * Lowercase letters, digits and inner hyphens; 1 to 64 characters.
 */
export const SLUG_PATTERN = /^[a-z0-9](?:[a-z0-9-]{0,62}[a-z0-9])?$/;

export const PAGES_COLLECTION = 'pages';
export const PHOTOS_COLLECTION = 'page_photos';

/**
 * Maximum number of files accepted in one edit request.
 */
export const MAX_PHOTOS_PER_REQUEST = 20;

export const DEFAULT_PAGE_FIELDS: Readonly<IPageFields> = Object.freeze<IPageFields>({
    title: 'Our page',
    message: '',
    backgroundColor: '#ffffff',
    theme: 'classic',
    fontStyle: 'serif',
    fontColor: '#333333',
    titleColor: '#222222',
    fontSize: 'medium',
    aspectRatio: 'square',
    galleryTitle: 'Gallery',
    layoutOrder: ['message', 'gallery', 'music', 'timeline']
});

/**
 * Trim and lowercase a slug for lookup.
 */
export function normalizeSlug(slug: string): string {
    return slug.trim().toLowerCase();
}

/**
 * Parse a comma-delimited section list.
 *
 * Unknown entries and repeats are dropped; the first occurrence wins.
 */
export function parseLayoutOrder(value: string | readonly string[]): PageSection[] {
    const entries = typeof value === 'string' ? value.split(',') : value;
    const result: PageSection[] = [];
    for (const raw of entries) {
        const entry = raw.trim().toLowerCase();
        const section = PAGE_SECTIONS.find(candidate => candidate === entry);
        if (section && !result.includes(section)) {
            result.push(section);
        }
    }
    return result;
}

function pick<T>(override: T | undefined, current: T): T {
    if (override === undefined) return current;
    if (typeof override === 'string' && override.trim() === '') return current;
    if (Array.isArray(override) && override.length === 0) return current;
    return override;
}

/**
 * Apply presentation overrides on top of current values.
 *
 * Absent, empty and blank overrides keep the current value.
 */
export function mergePageFields(current: IPageFields, overrides: Partial<IPageFields>): IPageFields {
    return {
        title: pick(overrides.title, current.title),
        message: pick(overrides.message, current.message),
        backgroundColor: pick(overrides.backgroundColor, current.backgroundColor),
        theme: pick(overrides.theme, current.theme),
        fontStyle: pick(overrides.fontStyle, current.fontStyle),
        fontColor: pick(overrides.fontColor, current.fontColor),
        titleColor: pick(overrides.titleColor, current.titleColor),
        fontSize: pick(overrides.fontSize, current.fontSize),
        aspectRatio: pick(overrides.aspectRatio, current.aspectRatio),
        galleryTitle: pick(overrides.galleryTitle, current.galleryTitle),
        layoutOrder: [...pick(overrides.layoutOrder, current.layoutOrder)]
    };
}
