import { Router } from 'express';
import { asyncHandler } from '../../api/middleware/async-handler.js';
import type { MusicController } from './api/music.controller.js';

/**
 * Create Express router for music endpoints, mounted at /api/music.
 */
export function createMusicRouter(controller: MusicController): Router {
    const router = Router();

    /**
     * GET /api/music/search
     * Track search for the editor's music picker
     */
    router.get('/search', asyncHandler(controller.search.bind(controller)));

    return router;
}
