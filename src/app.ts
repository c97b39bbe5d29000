/**
 * Express application setup
 */

import express, { type Express } from 'express';
import helmet from 'helmet';
import { config } from './config/index.js';
import { corsMiddleware } from './api/middleware/cors.middleware.js';
import { errorHandler } from './api/middleware/errorHandler.js';
import { requestLogger } from './api/middleware/requestLogger.js';
import { createApiRouter } from './api/routes/index.js';
import type { EvaluationController } from './api/controllers/evaluation.controller.js';

export interface AppOptions {
  /** Evaluate route controller, the shared singleton when omitted */
  controller?: EvaluationController;
}

export function createApp(options: AppOptions = {}): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(helmet());
  app.use(corsMiddleware);
  app.use(express.json({ limit: config.requestBodyLimit }));
  app.use(requestLogger);

  app.use('/api/v1', createApiRouter(options.controller));

  app.get('/', (_req, res) => {
    res.json({
      name: config.serviceName,
      version: config.serviceVersion,
      endpoints: ['POST /api/v1/evaluate', 'GET /api/v1/health'],
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Malformed JSON and oversized bodies arrive here from express.json()
  app.use(errorHandler);

  return app;
}

export default createApp();
