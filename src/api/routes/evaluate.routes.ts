/**
 * Move evaluation routes
 */

import { Router } from 'express';
import {
  EvaluationController,
  evaluationController,
} from '../controllers/evaluation.controller.js';

/**
 * POST /api/v1/evaluate
 * Evaluate a language model's move against Stockfish
 *
 * Request body:
 * {
 *   fen: string,            // Position before the move
 *   llm_move_san: string,   // Candidate move in SAN
 *   top_n?: number,         // Ranked engine lines to return, integer 1..10 (default 3)
 *   multipv?: boolean       // Request top_n lines instead of one (default false)
 * }
 *
 * top_n and multipv are checked strictly: a top_n outside 1..10, a
 * fractional top_n, or a multipv that is not a JSON boolean ("true", 1)
 * answers 400 with validation details instead of being passed to the engine.
 *
 * Response:
 * {
 *   stockfish_moves: string[],
 *   stockfish_eval: number,
 *   llm_move: string,       // UCI
 *   post_move_fen: string,
 *   llm_eval: number,
 *   centipawn_loss: number,
 *   move_quality: 'Excellent' | 'Good' | 'Inaccuracy' | 'Mistake' | 'Blunder',
 *   llm_color: 'white' | 'black'
 * }
 */
export function createEvaluateRouter(
  controller: EvaluationController = evaluationController
): Router {
  const router = Router();

  router.post('/', (req, res, next) => {
    controller.evaluateMove(req, res).catch(next);
  });

  return router;
}
