import { z } from 'zod';
import type { IPageEditRequest, IPhotoOrderUpdate, IUploadedFile } from '@keepsake/types';
import { ValidationError } from '../../../lib/errors.js';
import {
    PAGE_ASPECT_RATIOS,
    PAGE_FONT_SIZES,
    PAGE_FONT_STYLES,
    PAGE_THEMES,
    SLUG_PATTERN,
    parseLayoutOrder
} from '../page.constants.js';

const blankToUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const absentMarker = (value: unknown) => (value === null || value === false ? undefined : blankToUndefined(value));

const timelineIndex = z.preprocess(
    absentMarker,
    z
        .union([
            z.number().int(),
            z
                .string()
                .trim()
                .regex(/^-?\d+$/, 'Expected an integer')
                .transform(Number)
        ])
        .optional()
);

const parseJsonString = (value: unknown) => {
    if (typeof value !== 'string') {
        return value;
    }
    try {
        return JSON.parse(value);
    } catch {
        return value;
    }
};

const truthy = z
    .union([z.boolean(), z.string()])
    .optional()
    .transform(value => value === true || (typeof value === 'string' && ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase())));

const text = (max: number) => z.preprocess(blankToUndefined, z.string().trim().max(max).optional());
const color = z.preprocess(
    blankToUndefined,
    z
        .string()
        .trim()
        .regex(/^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/, 'Expected a hex color')
        .optional()
);

export const credentialSchema = z.string().trim().min(4, 'Credential must be at least 4 characters').max(200);

export const slugSchema = z
    .string()
    .trim()
    .toLowerCase()
    .regex(SLUG_PATTERN, 'Slug may contain lowercase letters, digits and inner hyphens only');

export const createPageSchema = z.object({
    slug: slugSchema,
    credential: credentialSchema,
    title: text(120)
});

export type CreatePageBody = z.infer<typeof createPageSchema>;

export const loginSchema = z.object({
    credential: z.string().min(1).max(200)
});

export type LoginBody = z.infer<typeof loginSchema>;

export const resetCredentialSchema = z.object({
    credential: credentialSchema
});

export type ResetCredentialBody = z.infer<typeof resetCredentialSchema>;

const photoOrderSchema = z.preprocess(
    parseJsonString,
    z.record(z.string(), z.union([z.string(), z.number()])).optional()
);

export const editPageSchema = z.object({
    title: text(120),
    message: text(5000),
    backgroundColor: color,
    theme: z.preprocess(blankToUndefined, z.enum(PAGE_THEMES).optional()),
    fontStyle: z.preprocess(blankToUndefined, z.enum(PAGE_FONT_STYLES).optional()),
    fontColor: color,
    titleColor: color,
    fontSize: z.preprocess(blankToUndefined, z.enum(PAGE_FONT_SIZES).optional()),
    aspectRatio: z.preprocess(blankToUndefined, z.enum(PAGE_ASPECT_RATIOS).optional()),
    galleryTitle: text(120),
    layoutOrder: z.preprocess(blankToUndefined, z.union([z.string(), z.array(z.string())]).optional()),
    newCredential: z.preprocess(blankToUndefined, credentialSchema.optional()),
    musicUrl: z.string().max(500).optional(),
    clearMusic: truthy,
    photoOrder: photoOrderSchema,
    deletePhotoId: text(64),
    deleteTimelineEventId: text(64),
    deleteTimelineIndex: timelineIndex,
    timelineDate: z.preprocess(
        blankToUndefined,
        z
            .string()
            .trim()
            .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date')
            .optional()
    ),
    timelineTitle: text(200)
});

export type EditPageBody = z.infer<typeof editPageSchema>;

/**
 * File fields read from a multer upload.
 */
export interface ReceivedFile {
    buffer: Buffer;
    originalname: string;
    mimetype: string;
    size: number;
}

/**
 * Turn `photoOrder` entries into reorder hints. Entries whose value is not an
 * integer are dropped.
 */
function toPhotoOrders(entries: Record<string, string | number> | undefined): IPhotoOrderUpdate[] {
    if (!entries) {
        return [];
    }
    const orders: IPhotoOrderUpdate[] = [];
    for (const [photoId, raw] of Object.entries(entries)) {
        const displayOrder = typeof raw === 'number' ? raw : raw.trim() === '' ? Number.NaN : Number(raw);
        if (Number.isInteger(displayOrder)) {
            orders.push({ photoId, displayOrder });
        }
    }
    return orders;
}

/**
 * Parse an edit submission into an {@link IPageEditRequest}.
 *
 * Accepts JSON, urlencoded and multipart bodies; `photoOrder` may be nested
 * form fields (`photoOrder[<id>]`) or a JSON object.
 *
 * @throws ValidationError when a field is malformed
 */
export function parseEditRequest(body: unknown, files: readonly ReceivedFile[] = []): IPageEditRequest {
    const result = editPageSchema.safeParse(body ?? {});
    if (!result.success) {
        throw new ValidationError('Invalid edit request', result.error.flatten());
    }
    const data = result.data;

    const uploads: IUploadedFile[] = files.map(file => ({
        buffer: file.buffer,
        originalName: file.originalname,
        mimeType: file.mimetype,
        size: file.size
    }));

    const layoutOrder = data.layoutOrder === undefined ? undefined : parseLayoutOrder(data.layoutOrder);

    return {
        fields: {
            title: data.title,
            message: data.message,
            backgroundColor: data.backgroundColor,
            theme: data.theme,
            fontStyle: data.fontStyle,
            fontColor: data.fontColor,
            titleColor: data.titleColor,
            fontSize: data.fontSize,
            aspectRatio: data.aspectRatio,
            galleryTitle: data.galleryTitle,
            layoutOrder: layoutOrder && layoutOrder.length > 0 ? layoutOrder : undefined
        },
        newCredential: data.newCredential,
        musicUrl: data.musicUrl,
        clearMusic: data.clearMusic,
        uploads,
        photoOrders: toPhotoOrders(data.photoOrder),
        deletePhotoId: data.deletePhotoId,
        deleteTimelineEventId: data.deleteTimelineEventId,
        deleteTimelineIndex: data.deleteTimelineIndex,
        newTimelineEvent:
            data.timelineDate || data.timelineTitle
                ? { date: data.timelineDate ?? '', title: data.timelineTitle ?? '' }
                : undefined
    };
}
