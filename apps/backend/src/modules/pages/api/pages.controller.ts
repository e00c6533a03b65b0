import type { Request, Response } from 'express';
import multer from 'multer';
import type { ILogger, IPageRepository } from '@keepsake/types';
import { NotFoundError, UnauthorizedError } from '../../../lib/errors.js';
import type { AccessGate } from '../services/access-gate.service.js';
import type { PageReconciler } from '../services/page-reconciler.service.js';
import { hashCredential } from '../services/credential-hasher.js';
import { MAX_PHOTOS_PER_REQUEST } from '../page.constants.js';
import { toPublicPage } from './page.views.js';
import { parseEditRequest, type CreatePageBody, type LoginBody, type ResetCredentialBody } from './pages.schemas.js';

/**
 * Controller for page endpoints.
 *
 * Public routes are mounted at /api/pages, the administrative credential reset
 * at /api/admin/pages. Errors propagate to the error-handler middleware.
 */
export class PagesController {
    /**
     * Multer middleware for photo uploads.
     * Stores files in memory as Buffer for processing.
     * Hard limit set to 100MB; the configured per-file limit is enforced per file
     * by the reconciler so one oversized photo does not reject the whole edit.
     */
    private readonly upload = multer({
        storage: multer.memoryStorage(),
        limits: {
            fileSize: 100 * 1024 * 1024,
            files: MAX_PHOTOS_PER_REQUEST
        }
    });

    constructor(
        private readonly repository: IPageRepository,
        private readonly reconciler: PageReconciler,
        private readonly gate: AccessGate,
        private readonly logger: ILogger
    ) {}

    getUploadMiddleware() {
        return this.upload.array('photos', MAX_PHOTOS_PER_REQUEST);
    }

    private async loadPage(slug: string) {
        const page = await this.repository.findBySlug(slug);
        if (!page) {
            throw new NotFoundError('Page not found', { slug });
        }
        return page;
    }

    /**
     * POST /api/pages
     *
     * Sign up: create a page and open an admin session for it.
     *
     * Request body: { slug, credential, title? }
     * Response: 201 { success, page }
     */
    async createPage(req: Request, res: Response): Promise<void> {
        const body: CreatePageBody = req.body;
        const credentialHash = await hashCredential(body.credential);
        const page = await this.repository.create(body.slug, { credentialHash, title: body.title });

        this.gate.establish(res, page.slug);
        res.status(201).json({ success: true, page: toPublicPage({ ...page, photos: [] }) });
    }

    /**
     * GET /api/pages/:slug
     */
    async getPublicPage(req: Request, res: Response): Promise<void> {
        const page = await this.loadPage(req.params.slug);
        res.json({ success: true, page: toPublicPage(page) });
    }

    /**
     * GET /api/pages/:slug/admin
     *
     * Anonymous clients and unknown slugs get the same answer.
     */
    async getAdminView(req: Request, res: Response): Promise<void> {
        const { slug } = req.params;
        if (!this.gate.isAuthenticatedFor(req, slug)) {
            res.json({ success: true, authenticated: false });
            return;
        }

        const page = await this.repository.findBySlug(slug);
        if (!page) {
            this.gate.clear(res);
            res.json({ success: true, authenticated: false });
            return;
        }

        res.json({ success: true, authenticated: true, page: toPublicPage(page) });
    }

    /**
     * POST /api/pages/:slug/admin/login
     *
     * Request body: { credential }
     */
    async login(req: Request, res: Response): Promise<void> {
        const { slug } = req.params;
        const body: LoginBody = req.body;

        const page = await this.gate.login(slug, body.credential);
        if (!page) {
            throw new UnauthorizedError('Invalid credential');
        }

        this.gate.establish(res, page.slug);
        res.json({ success: true, authenticated: true });
    }

    /**
     * POST /api/pages/:slug/admin/logout
     */
    async logout(_req: Request, res: Response): Promise<void> {
        this.gate.clear(res);
        res.json({ success: true, authenticated: false });
    }

    /**
     * POST /api/pages/:slug/admin
     *
     * Apply an edit. Requires an admin session for the slug (route guard).
     *
     * Response: { success, result, page }
     */
    async editPage(req: Request, res: Response): Promise<void> {
        const page = await this.loadPage(req.params.slug);
        const files = Array.isArray(req.files) ? req.files : [];
        const request = parseEditRequest(req.body, files);

        const result = await this.reconciler.reconcile(page, request);
        const refreshed = await this.loadPage(page.slug);

        res.json({ success: true, result, page: toPublicPage(refreshed) });
    }

    /**
     * POST /api/admin/pages/:slug/credential
     *
     * Emergency credential replacement, gated by the admin token.
     *
     * Request body: { credential }
     */
    async resetCredential(req: Request, res: Response): Promise<void> {
        const { slug } = req.params;
        const body: ResetCredentialBody = req.body;

        const replaced = await this.repository.replaceCredential(slug, await hashCredential(body.credential));
        if (!replaced) {
            throw new NotFoundError('Page not found', { slug });
        }

        this.logger.warn({ slug, requestId: req.id }, 'Page credential reset by administrator');
        res.json({ success: true });
    }
}
