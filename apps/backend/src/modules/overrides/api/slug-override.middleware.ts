import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import type { ILogger, SlugOverride } from '@keepsake/types';

/**
 * Anything that can look up the override for a slug.
 */
export interface SlugOverrideLookup {
    find(slug: string): Promise<SlugOverride | null>;
}

/**
 * Middleware deciding, before the page is resolved, whether a slug is
 * redirected or replaced by a notice.
 *
 * - redirect: 302 with `Location` and `{ redirectTo }`
 * - notice: 200 with `{ override: { message } }`
 *
 * When the lookup fails the error is logged and the request continues to
 * normal page resolution.
 */
export function createSlugOverrideMiddleware(lookup: SlugOverrideLookup, logger: ILogger): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const slug = req.params.slug;
        if (!slug) {
            next();
            return;
        }

        lookup.find(slug).then(
            override => {
                if (!override) {
                    next();
                    return;
                }
                if (override.type === 'redirect') {
                    res.status(StatusCodes.MOVED_TEMPORARILY)
                        .location(override.redirectTo)
                        .json({ success: true, redirectTo: override.redirectTo });
                    return;
                }
                res.json({ success: true, override: { message: override.message } });
            },
            (error: unknown) => {
                logger.warn({ error, slug, requestId: req.id }, 'Slug override lookup failed, resolving page normally');
                next();
            }
        ).catch(next);
    };
}
