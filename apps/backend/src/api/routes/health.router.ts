import { Router } from 'express';
import { asyncHandler } from '../middleware/async-handler.js';
import type { SystemHealthController } from '../../modules/system/index.js';

export function healthRouter(controller: SystemHealthController) {
  const router = Router();
  router.get('/', asyncHandler(controller.getHealth.bind(controller)));
  return router;
}
