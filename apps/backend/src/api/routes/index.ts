import { Router } from 'express';
import type { SystemHealthController } from '../../modules/system/index.js';
import { healthRouter } from './health.router.js';

/**
 * Create the API router for endpoints that do not belong to a module.
 *
 * Pages, music and override routers are mounted directly by their modules in
 * bootstrap (apps/backend/src/index.ts) following the IModule pattern.
 *
 * @param health - Health controller built from the initialized modules
 * @returns Express router mounted at /api
 */
export function createApiRouter(health: SystemHealthController) {
  const router = Router();

  router.use('/health', healthRouter(health));

  return router;
}
