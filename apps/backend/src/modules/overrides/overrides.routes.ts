import { Router } from 'express';
import { asyncHandler } from '../../api/middleware/async-handler.js';
import { validateBody } from '../../api/middleware/validate.js';
import { overrideSchema, type OverridesController } from './api/overrides.controller.js';

/**
 * Create Express router for override administration.
 *
 * Mounted at /api/admin/overrides behind the admin-token middleware.
 */
export function createOverridesRouter(controller: OverridesController): Router {
    const router = Router();

    router.put('/:slug', validateBody(overrideSchema), asyncHandler(controller.put.bind(controller)));
    router.delete('/:slug', asyncHandler(controller.remove.bind(controller)));

    return router;
}
