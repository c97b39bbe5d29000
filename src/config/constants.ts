/**
 * Evaluation constants - All values in centipawns (100cp = 1 pawn)
 */

// ═══════════════════════════════════════════════════════════════════════
// MOVE QUALITY THRESHOLDS
// ═══════════════════════════════════════════════════════════════════════

/**
 * Upper bounds (exclusive) of each quality band. Anything at or above
 * MISTAKE is a blunder.
 */
export const MOVE_QUALITY_THRESHOLDS = {
  EXCELLENT: 20,
  GOOD: 50,
  INACCURACY: 100,
  MISTAKE: 300,
} as const;

/**
 * Reported as both llm_eval and centipawn_loss for moves that do not parse
 */
export const ILLEGAL_MOVE_SENTINEL = 10000;

// ═══════════════════════════════════════════════════════════════════════
// MATE SCORES
// ═══════════════════════════════════════════════════════════════════════

export const MATE_SCORE_BASE = 100000;

/**
 * Convert a UCI "mate N" score to centipawns.
 * Shorter mates score higher; N <= 0 means the side to move is mated.
 */
export function mateToCentipawns(mateIn: number): number {
  return mateIn > 0 ? MATE_SCORE_BASE - mateIn * 100 : -MATE_SCORE_BASE - mateIn * 100;
}

// ═══════════════════════════════════════════════════════════════════════
// REQUEST DEFAULTS
// ═══════════════════════════════════════════════════════════════════════

export const DEFAULT_TOP_N = 3;
export const MAX_TOP_N = 10;

// ═══════════════════════════════════════════════════════════════════════
// MESSAGES
// ═══════════════════════════════════════════════════════════════════════

export const ERROR_MESSAGES = {
  MISSING_PARAMETERS:
    "Missing required parameters: 'fen' and 'llm_move_san' must be provided.",
  ILLEGAL_MOVE: 'Illegal move format or invalid move.',
  UNEXPECTED_ANALYSIS: 'Stockfish analysis returned unexpected result format.',
  ENGINE_TERMINATED: 'Stockfish engine terminated unexpectedly. Check path and permissions.',
  ENGINE_ERROR_PREFIX: 'An error occurred during Stockfish analysis: ',
} as const;
