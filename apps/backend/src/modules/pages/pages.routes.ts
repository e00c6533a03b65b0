import { Router } from 'express';
import type { RequestHandler } from 'express';
import { asyncHandler } from '../../api/middleware/async-handler.js';
import { requirePageSession } from '../../api/middleware/page-session.js';
import { validateBody } from '../../api/middleware/validate.js';
import type { PagesController } from './api/pages.controller.js';
import type { AccessGate } from './services/access-gate.service.js';
import { createPageSchema, loginSchema, resetCredentialSchema } from './api/pages.schemas.js';

/**
 * Create Express router for page endpoints.
 *
 * Routes are mounted at /api/pages. Middleware placed in `beforeView` runs
 * ahead of the public view route (the slug override router).
 *
 * @param controller - Pages controller instance
 * @param gate - Access gate guarding the edit route
 * @param beforeView - Handlers to run before public page resolution
 */
export function createPagesRouter(
    controller: PagesController,
    gate: AccessGate,
    beforeView: RequestHandler[] = []
): Router {
    const router = Router();

    /**
     * POST /api/pages
     * Create a page (signup)
     */
    router.post('/', validateBody(createPageSchema), asyncHandler(controller.createPage.bind(controller)));

    /**
     * GET /api/pages/:slug/admin
     * Session state and, when authenticated, the editable page
     *
     * Note: admin routes come before /:slug to keep the view route last
     */
    router.get('/:slug/admin', asyncHandler(controller.getAdminView.bind(controller)));

    /**
     * POST /api/pages/:slug/admin/login
     */
    router.post('/:slug/admin/login', validateBody(loginSchema), asyncHandler(controller.login.bind(controller)));

    /**
     * POST /api/pages/:slug/admin/logout
     */
    router.post('/:slug/admin/logout', asyncHandler(controller.logout.bind(controller)));

    /**
     * POST /api/pages/:slug/admin
     * Edit the page (multipart or JSON)
     */
    router.post(
        '/:slug/admin',
        requirePageSession(gate),
        controller.getUploadMiddleware(),
        asyncHandler(controller.editPage.bind(controller))
    );

    /**
     * GET /api/pages/:slug
     * Public view, after any slug override
     */
    router.get('/:slug', ...beforeView, asyncHandler(controller.getPublicPage.bind(controller)));

    return router;
}

/**
 * Create Express router for administrative page endpoints.
 *
 * Mounted at /api/admin/pages behind the admin-token middleware.
 */
export function createAdminPagesRouter(controller: PagesController): Router {
    const router = Router();

    /**
     * POST /api/admin/pages/:slug/credential
     * Replace a page credential
     */
    router.post(
        '/:slug/credential',
        validateBody(resetCredentialSchema),
        asyncHandler(controller.resetCredential.bind(controller))
    );

    return router;
}
