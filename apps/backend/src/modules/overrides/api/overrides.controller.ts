import type { Request, Response } from 'express';
import { z } from 'zod';
import { NotFoundError } from '../../../lib/errors.js';
import type { SlugOverrideInput, SlugOverrideService } from '../services/slug-override.service.js';

/**
 * Redirect targets are site-relative paths or absolute http(s) URLs.
 */
const redirectTarget = z
    .string()
    .trim()
    .max(2000)
    .refine(value => /^\/(?!\/)/.test(value) || /^https?:\/\/[^\s]+$/i.test(value), {
        message: 'Expected a site-relative path or an http(s) URL'
    });

export const overrideSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('redirect'), redirectTo: redirectTarget }),
    z.object({ type: z.literal('notice'), message: z.string().trim().min(1).max(2000) })
]);

/**
 * Administrative management of slug overrides, mounted at /api/admin/overrides.
 */
export class OverridesController {
    constructor(private readonly service: SlugOverrideService) {}

    /**
     * PUT /api/admin/overrides/:slug
     *
     * Request body: { type: 'redirect', redirectTo } | { type: 'notice', message }
     */
    async put(req: Request, res: Response): Promise<void> {
        const input: SlugOverrideInput = req.body;
        const override = await this.service.set(req.params.slug, input);
        res.json({ success: true, override });
    }

    /**
     * DELETE /api/admin/overrides/:slug
     */
    async remove(req: Request, res: Response): Promise<void> {
        const removed = await this.service.remove(req.params.slug);
        if (!removed) {
            throw new NotFoundError('Override not found', { slug: req.params.slug });
        }
        res.status(204).send();
    }
}
