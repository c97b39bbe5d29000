/**
 * API routes index
 */

import { Router } from 'express';
import healthRoutes from './health.routes.js';
import { createEvaluateRouter } from './evaluate.routes.js';
import type { EvaluationController } from '../controllers/evaluation.controller.js';

export function createApiRouter(controller?: EvaluationController): Router {
  const router = Router();

  router.use('/health', healthRoutes);
  router.use('/evaluate', createEvaluateRouter(controller));

  return router;
}
