/**
 * Request logging - one line per finished request, with the evaluation
 * outcome when the evaluate route recorded one
 */

import type { NextFunction, Request, Response } from 'express';
import { logger } from '../../utils/logger.js';

const requestLog = logger.child({ middleware: 'requestLogger' });

export interface RequestOutcome {
  moveQuality?: string;
  error?: string;
}

const outcomes = new WeakMap<Response, RequestOutcome>();

export function recordOutcome(res: Response, outcome: RequestOutcome): void {
  outcomes.set(res, outcome);
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();

  res.on('finish', () => {
    const outcome = outcomes.get(res);
    const entry = {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      durationMs: Date.now() - start,
      ...outcome,
    };

    if (res.statusCode >= 500) {
      requestLog.warn(entry, 'Request failed');
    } else {
      requestLog.info(entry, 'Request completed');
    }
  });

  next();
}
