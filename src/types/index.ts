/**
 * Type definitions for move evaluation
 */

export type PlayerColor = 'white' | 'black';

export type MoveQuality = 'Excellent' | 'Good' | 'Inaccuracy' | 'Mistake' | 'Blunder';

/**
 * Evaluation score - either centipawns or mate in N, relative to the side to move
 */
export type Score =
  | { type: 'cp'; value: number }
  | { type: 'mate'; value: number };

// ═══════════════════════════════════════════════════════════════════════
// Engine Types
// ═══════════════════════════════════════════════════════════════════════

/**
 * One principal variation reported by the engine
 */
export interface EngineLine {
  multipv: number;
  depth: number;
  score: Score;
  pv: string[];
}

/**
 * Engine analysis of a single position, lines ordered best first
 */
export interface EngineAnalysis {
  lines: EngineLine[];
  bestMove: string | null;
  depth: number;
}

export interface AnalysisOptions {
  /** Search time in milliseconds */
  movetime: number;
  /** Number of ranked lines to request */
  multiPv: number;
}

/**
 * Analysis oracle, acquired for one evaluation and disposed afterwards
 */
export interface AnalysisEngine {
  initialize(): Promise<void>;
  analyze(fen: string, options: AnalysisOptions): Promise<EngineAnalysis>;
  dispose(): Promise<void>;
}

export type EngineFactory = () => AnalysisEngine;

// ═══════════════════════════════════════════════════════════════════════
// Evaluation Types
// ═══════════════════════════════════════════════════════════════════════

export interface EvaluateOptions {
  topN?: number;
  multiPv?: boolean;
}

/**
 * Successful evaluation, keyed the way the API returns it
 */
export interface EvaluationReport {
  stockfish_moves: string[];
  stockfish_eval: number;
  llm_move: string;
  post_move_fen: string;
  llm_eval: number;
  centipawn_loss: number;
  move_quality: MoveQuality;
  llm_color: PlayerColor;
}

export type EngineFailureKind =
  | 'engine_unavailable'
  | 'engine_response_malformed'
  | 'engine_error';

export type EvaluationFailure =
  | {
      kind: 'illegal_move';
      llmMove: string;
      llmColor: PlayerColor;
      message: string;
    }
  | {
      kind: EngineFailureKind;
      llmColor: PlayerColor;
      message: string;
    };

export type EvaluationResult =
  | { ok: true; report: EvaluationReport }
  | { ok: false; failure: EvaluationFailure };

// ═══════════════════════════════════════════════════════════════════════
// API Types
// ═══════════════════════════════════════════════════════════════════════

export interface IllegalMoveBody {
  llm_move: string;
  llm_eval: number;
  centipawn_loss: number;
  move_quality: 'Illegal';
  llm_color: PlayerColor;
  error: string;
}

export interface EngineFailureBody {
  error: string;
  llm_color: PlayerColor;
}

export interface ErrorBody {
  error: string;
  details?: Array<{ path: string; message: string }>;
}

export type ResponseBody = EvaluationReport | IllegalMoveBody | EngineFailureBody | ErrorBody;

/**
 * Handler response envelope
 */
export interface HandlerResponse {
  statusCode: number;
  body: ResponseBody;
}

/**
 * Health check response
 */
export interface HealthResponse {
  status: 'healthy';
  engine: {
    path: string;
    analysisTimeMs: number;
  };
  uptime: number;
  version: string;
}
