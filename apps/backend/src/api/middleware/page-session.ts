import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { UnauthorizedError } from '../../lib/errors.js';

/**
 * Anything that can tell whether a request holds an admin session for a slug.
 */
export interface PageSessionChecker {
    isAuthenticatedFor(req: Request, slug: string): boolean;
}

/**
 * Guard a route on the admin session of the page named by `:slug`.
 *
 * A session for one page never opens another page's admin routes.
 *
 * @param gate - Session checker, usually the AccessGate
 */
export function requirePageSession(gate: PageSessionChecker): RequestHandler {
    return (req: Request, _res: Response, next: NextFunction) => {
        const slug = req.params.slug;
        if (!slug || !gate.isAuthenticatedFor(req, slug)) {
            next(new UnauthorizedError('Admin session required for this page'));
            return;
        }
        next();
    };
}
