/**
 * Health check routes
 */

import { Router, type Request, type Response } from 'express';
import { config } from '../../config/index.js';
import type { HealthResponse } from '../../types/index.js';

const router = Router();
const startTime = Date.now();

router.get('/', (_req: Request, res: Response) => {
  // Engines are started per request, so there is nothing to probe here
  const response: HealthResponse = {
    status: 'healthy',
    engine: {
      path: config.stockfishPath,
      analysisTimeMs: config.analysisTimeMs,
    },
    uptime: Math.floor((Date.now() - startTime) / 1000),
    version: config.serviceVersion,
  };

  res.json(response);
});

export default router;
