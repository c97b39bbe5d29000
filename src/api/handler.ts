/**
 * Evaluation request handler - shared by the HTTP route and the function entry point
 */

import type {
  EvaluateOptions,
  EvaluationResult,
  HandlerResponse,
} from '../types/index.js';
import { ERROR_MESSAGES, ILLEGAL_MOVE_SENTINEL } from '../config/constants.js';
import { config } from '../config/index.js';
import { moveEvaluationService } from '../services/MoveEvaluationService.js';
import { InvalidFenError } from '../utils/position.js';
import {
  evaluateRequestSchema,
  formatValidationErrors,
  validateRequest,
} from '../utils/validation.js';
import { logger } from '../utils/logger.js';

const handlerLogger = logger.child({ handler: 'evaluate' });

export interface MoveEvaluator {
  evaluate(fen: string, moveText: string, options?: EvaluateOptions): Promise<EvaluationResult>;
}

export interface HandlerDependencies {
  evaluator?: MoveEvaluator;
  illegalMoveStatusCode?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Evaluate the move described by `event` and wrap the outcome in a
 * `{ statusCode, body }` envelope.
 */
export async function main(
  event: unknown,
  deps: HandlerDependencies = {}
): Promise<HandlerResponse> {
  const evaluator = deps.evaluator ?? moveEvaluationService;
  const fields: Record<string, unknown> = isRecord(event) ? event : {};

  if (!fields.fen || !fields.llm_move_san) {
    return {
      statusCode: 400,
      body: { error: ERROR_MESSAGES.MISSING_PARAMETERS },
    };
  }

  const validation = validateRequest(evaluateRequestSchema, fields);
  if (!validation.success) {
    return {
      statusCode: 400,
      body: {
        error: 'Validation error',
        details: formatValidationErrors(validation.errors),
      },
    };
  }

  const { fen, llm_move_san, top_n, multipv } = validation.data;

  let result: EvaluationResult;
  try {
    result = await evaluator.evaluate(fen, llm_move_san, { topN: top_n, multiPv: multipv });
  } catch (error) {
    if (error instanceof InvalidFenError) {
      handlerLogger.debug({ fen }, 'Rejected malformed FEN');
      return { statusCode: 400, body: { error: error.message } };
    }
    throw error;
  }

  return toHandlerResponse(
    result,
    deps.illegalMoveStatusCode ?? config.illegalMoveStatusCode
  );
}

export function toHandlerResponse(
  result: EvaluationResult,
  illegalMoveStatusCode: number
): HandlerResponse {
  if (result.ok) {
    return { statusCode: 200, body: result.report };
  }

  const { failure } = result;

  if (failure.kind === 'illegal_move') {
    return {
      statusCode: illegalMoveStatusCode,
      body: {
        llm_move: failure.llmMove,
        llm_eval: ILLEGAL_MOVE_SENTINEL,
        centipawn_loss: ILLEGAL_MOVE_SENTINEL,
        move_quality: 'Illegal',
        llm_color: failure.llmColor,
        error: failure.message,
      },
    };
  }

  return {
    statusCode: 500,
    body: {
      error: failure.message,
      llm_color: failure.llmColor,
    },
  };
}
