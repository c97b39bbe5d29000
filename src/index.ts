/**
 * LLM Move Evaluator - function entry point and public API
 *
 * `main(event)` takes the request fields directly and returns
 * `{ statusCode, body }`, so it can be deployed as a serverless function.
 */

import 'dotenv/config';

export { main, toHandlerResponse } from './api/handler.js';
export type { HandlerDependencies, MoveEvaluator } from './api/handler.js';
export { MoveEvaluationService } from './services/MoveEvaluationService.js';
export type { MoveEvaluationServiceOptions } from './services/MoveEvaluationService.js';
export { describeQuality } from './classifiers/QualityClassifier.js';
export { calculateCentipawnLoss } from './classifiers/CentipawnLossCalculator.js';
export { StockfishEngine } from './engine/StockfishEngine.js';
export type { StockfishEngineOptions, EngineProcess } from './engine/StockfishEngine.js';
export { withEngine, createStockfishEngine } from './engine/engineSession.js';
export {
  EngineError,
  EngineUnavailableError,
  EngineTimeoutError,
  EngineResponseError,
} from './engine/errors.js';
export { InvalidFenError } from './utils/position.js';
export type * from './types/index.js';
