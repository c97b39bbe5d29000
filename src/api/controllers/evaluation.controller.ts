/**
 * Evaluation controller - Handles move evaluation requests
 */

import type { Request, Response } from 'express';
import { main, type HandlerDependencies } from '../handler.js';
import { recordOutcome } from '../middleware/requestLogger.js';

export class EvaluationController {
  constructor(private readonly deps: HandlerDependencies = {}) {}

  /**
   * Evaluate a single move; the status code comes from the handler envelope
   */
  async evaluateMove(req: Request, res: Response): Promise<void> {
    const { statusCode, body } = await main(req.body, this.deps);

    recordOutcome(res, {
      moveQuality: 'move_quality' in body ? body.move_quality : undefined,
      error: 'error' in body ? body.error : undefined,
    });

    res.status(statusCode).json(body);
  }
}

// Singleton instance
export const evaluationController = new EvaluationController();
