import type { Request, Response } from 'express';
import { z } from 'zod';
import type { IMusicLookupClient } from '@keepsake/types';
import { ValidationError } from '../../../lib/errors.js';

export const MIN_QUERY_LENGTH = 2;
export const DEFAULT_SEARCH_LIMIT = 8;

const searchQuerySchema = z.object({
    q: z
        .union([z.string(), z.array(z.string())])
        .optional()
        .transform(value => (Array.isArray(value) ? value[0] ?? '' : value ?? '').trim()),
    limit: z.coerce.number().int().optional()
});

/**
 * Controller for the music search endpoint used by the page editor.
 */
export class MusicController {
    constructor(private readonly client: IMusicLookupClient) {}

    /**
     * GET /api/music/search?q=&limit=
     *
     * Queries shorter than two characters return an empty list without
     * calling the catalog.
     *
     * Response: { success, results: ITrackDescriptor[] }
     */
    async search(req: Request, res: Response): Promise<void> {
        const parsed = searchQuerySchema.safeParse(req.query);
        if (!parsed.success) {
            throw new ValidationError('Invalid query parameters', parsed.error.flatten());
        }

        const { q, limit } = parsed.data;
        if (q.length < MIN_QUERY_LENGTH) {
            res.json({ success: true, results: [] });
            return;
        }

        const results = await this.client.search(q, limit ?? DEFAULT_SEARCH_LIMIT);
        res.json({ success: true, results });
    }
}
