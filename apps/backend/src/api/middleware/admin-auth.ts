import { createHash, timingSafeEqual } from 'node:crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ServiceUnavailableError } from '../../lib/errors.js';

/**
 * Compare two secrets in constant time.
 *
 * Both sides are hashed first so inputs of different lengths take the same path.
 */
export function secretsMatch(candidate: string, expected: string): boolean {
    const candidateDigest = createHash('sha256').update(candidate).digest();
    const expectedDigest = createHash('sha256').update(expected).digest();
    return timingSafeEqual(candidateDigest, expectedDigest);
}

/**
 * Read the admin token from the request headers.
 *
 * Supported authentication methods:
 * - x-admin-token header (recommended)
 * - Authorization: Bearer {token} header
 *
 * Query parameters are never consulted; tokens in URLs end up in access logs
 * and Referer headers.
 */
export function readAdminToken(req: Request): string | undefined {
    const xAdminToken = req.headers['x-admin-token'];
    let candidate = Array.isArray(xAdminToken) ? xAdminToken[0] : xAdminToken;

    if (!candidate) {
        const authHeader = req.headers['authorization'];
        if (authHeader && authHeader.startsWith('Bearer ')) {
            candidate = authHeader.substring(7);
        }
    }

    return candidate || undefined;
}

/**
 * Admin authentication middleware factory.
 *
 * Accepts any of the configured tokens, so a rotated-out token keeps working
 * while clients move to the new one. With no tokens configured every request is
 * passed on as a {@link ServiceUnavailableError}.
 *
 * @param tokens - Accepted tokens, current first
 */
export function requireAdmin(tokens: readonly string[]): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        if (tokens.length === 0) {
            next(new ServiceUnavailableError('Admin API disabled'));
            return;
        }

        const candidate = readAdminToken(req);

        // Every token is compared so timing does not reveal which one matched
        let matched = false;
        for (const token of tokens) {
            if (candidate !== undefined && secretsMatch(candidate, token)) {
                matched = true;
            }
        }

        if (!matched) {
            res.status(401).json({ success: false, error: 'Unauthorized' });
            return;
        }

        next();
    };
}
