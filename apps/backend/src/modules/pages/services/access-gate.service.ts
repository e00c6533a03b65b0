import type { CookieOptions, Request, Response } from 'express';
import type { ILogger, IPageRepository, IPageWithPhotos } from '@keepsake/types';
import type { AppConfig } from '../../../config/env.js';
import { normalizeSlug } from '../page.constants.js';
import { hashCredential, verifyCredential } from './credential-hasher.js';

export const PAGE_SESSION_COOKIE = 'keepsake_admin';

/**
 * Credential check and per-slug admin session.
 *
 * A client session is either anonymous or authenticated for exactly one slug.
 * The slug is kept in a signed, http-only cookie; logging in to another page
 * replaces it. Session lifetime is the cookie's max age.
 */
export class AccessGate {
    /**
     * Hash compared against when the slug does not exist, so unknown pages
     * cost the same as a wrong credential.
     */
    private dummyHash?: Promise<string>;

    constructor(
        private readonly repository: IPageRepository,
        private readonly config: Pick<AppConfig, 'nodeEnv' | 'session'>,
        private readonly logger: ILogger
    ) {}

    /**
     * Verify a credential for a page.
     *
     * @returns The page when the credential matches, otherwise null. Unknown
     * slugs and wrong credentials are indistinguishable.
     */
    async login(slug: string, credential: string): Promise<IPageWithPhotos | null> {
        const page = await this.repository.findBySlug(slug);
        if (!page) {
            this.dummyHash ??= hashCredential('keepsake-unknown-page');
            await verifyCredential(credential, await this.dummyHash);
            this.logger.info({ slug: normalizeSlug(slug) }, 'Admin login failed');
            return null;
        }

        const valid = await verifyCredential(credential, page.credentialHash);
        this.logger.info({ slug: page.slug, success: valid }, valid ? 'Admin login succeeded' : 'Admin login failed');
        return valid ? page : null;
    }

    private cookieOptions(): CookieOptions {
        return {
            signed: true,
            httpOnly: true,
            sameSite: 'lax',
            secure: this.config.nodeEnv === 'production',
            maxAge: this.config.session.maxAgeMs,
            path: '/'
        };
    }

    /**
     * Mark the client as authenticated for a slug.
     */
    establish(res: Response, slug: string): void {
        res.cookie(PAGE_SESSION_COOKIE, normalizeSlug(slug), this.cookieOptions());
    }

    clear(res: Response): void {
        const { maxAge: _maxAge, ...options } = this.cookieOptions();
        res.clearCookie(PAGE_SESSION_COOKIE, options);
    }

    /**
     * @returns The slug the client is authenticated for, or null
     */
    authenticatedSlug(req: Request): string | null {
        const value: unknown = req.signedCookies?.[PAGE_SESSION_COOKIE];
        return typeof value === 'string' && value.length > 0 ? value : null;
    }

    isAuthenticatedFor(req: Request, slug: string): boolean {
        return this.authenticatedSlug(req) === normalizeSlug(slug);
    }
}
