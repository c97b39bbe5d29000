/**
 * Move Evaluation Service - Scores a candidate move against Stockfish's best lines
 */

import type { Chess, Move } from 'chess.js';
import type {
  AnalysisEngine,
  EngineFactory,
  EngineFailureKind,
  EvaluateOptions,
  EvaluationReport,
  EvaluationResult,
  PlayerColor,
} from '../types/index.js';
import { DEFAULT_TOP_N, ERROR_MESSAGES } from '../config/constants.js';
import { config } from '../config/index.js';
import { createStockfishEngine, withEngine } from '../engine/engineSession.js';
import { EngineResponseError, EngineUnavailableError } from '../engine/errors.js';
import { scoreToCentipawns } from '../engine/uciParser.js';
import { calculateCentipawnLoss } from '../classifiers/CentipawnLossCalculator.js';
import { describeQuality } from '../classifiers/QualityClassifier.js';
import { parsePosition, resolveMove, sideToMove, toUci } from '../utils/position.js';
import { logger } from '../utils/logger.js';

const evaluationLogger = logger.child({ service: 'MoveEvaluation' });

export interface MoveEvaluationServiceOptions {
  createEngine?: EngineFactory;
  analysisTimeMs?: number;
}

interface BestLines {
  topMoves: string[];
  bestScore: number;
  depth: number;
}

export class MoveEvaluationService {
  private readonly createEngine: EngineFactory;
  private readonly analysisTimeMs: number;

  constructor(options: MoveEvaluationServiceOptions = {}) {
    this.createEngine = options.createEngine ?? createStockfishEngine;
    this.analysisTimeMs = options.analysisTimeMs ?? config.analysisTimeMs;
  }

  /**
   * Evaluate `moveText` in the position `fen`.
   * Throws InvalidFenError for a malformed FEN; every other failure is
   * returned as `{ ok: false }`.
   */
  async evaluate(
    fen: string,
    moveText: string,
    options: EvaluateOptions = {}
  ): Promise<EvaluationResult> {
    const topN = options.topN ?? DEFAULT_TOP_N;
    const multiPv = options.multiPv ?? false;

    const chess = parsePosition(fen);
    const llmColor = sideToMove(chess);

    const move = resolveMove(chess, moveText);
    if (!move) {
      evaluationLogger.debug({ fen, moveText }, 'Move did not resolve');
      return {
        ok: false,
        failure: {
          kind: 'illegal_move',
          llmMove: moveText,
          llmColor,
          message: ERROR_MESSAGES.ILLEGAL_MOVE,
        },
      };
    }

    const lineCount = multiPv && topN > 1 ? topN : 1;

    try {
      const report = await withEngine(this.createEngine, (engine) =>
        this.analyzeMove(engine, chess, move, llmColor, lineCount)
      );

      evaluationLogger.info(
        {
          fen,
          move: report.llm_move,
          centipawnLoss: report.centipawn_loss,
          quality: report.move_quality,
        },
        'Move evaluated'
      );

      return { ok: true, report };
    } catch (error) {
      const { kind, message } = describeEngineFailure(error);
      evaluationLogger.error({ error, fen, moveText, kind }, 'Move evaluation failed');
      return { ok: false, failure: { kind, message, llmColor } };
    }
  }

  private async analyzeMove(
    engine: AnalysisEngine,
    chess: Chess,
    move: Move,
    llmColor: PlayerColor,
    lineCount: number
  ): Promise<EvaluationReport> {
    const fen = chess.fen();
    const { topMoves, bestScore, depth } = await this.analyzeBestLines(engine, fen, lineCount);
    evaluationLogger.debug({ fen, depth, topMoves }, 'Best lines found');

    // Apply LLM move and evaluate
    chess.move({ from: move.from, to: move.to, promotion: move.promotion });
    const postMoveFen = chess.fen();

    let llmScore: number;
    try {
      llmScore = await this.analyzeScore(engine, postMoveFen);
    } finally {
      chess.undo();
    }

    const centipawnLoss = calculateCentipawnLoss(llmColor, bestScore, llmScore);

    return {
      stockfish_moves: topMoves,
      stockfish_eval: bestScore,
      llm_move: toUci(move),
      post_move_fen: postMoveFen,
      llm_eval: llmScore,
      centipawn_loss: centipawnLoss,
      move_quality: describeQuality(centipawnLoss),
      llm_color: llmColor,
    };
  }

  private async analyzeBestLines(
    engine: AnalysisEngine,
    fen: string,
    lineCount: number
  ): Promise<BestLines> {
    const analysis = await engine.analyze(fen, {
      movetime: this.analysisTimeMs,
      multiPv: lineCount,
    });

    const topMoves: string[] = [];
    for (const [rank, line] of analysis.lines.slice(0, lineCount).entries()) {
      // A shallow top line can arrive without a PV; bestmove still names the move
      const firstMove = line.pv[0] ?? (rank === 0 ? analysis.bestMove : null);
      if (!firstMove) {
        throw new EngineResponseError(ERROR_MESSAGES.UNEXPECTED_ANALYSIS, fen);
      }
      topMoves.push(firstMove);
    }

    const [topLine] = analysis.lines;
    if (!topLine) {
      throw new EngineResponseError(ERROR_MESSAGES.UNEXPECTED_ANALYSIS, fen);
    }

    if (analysis.bestMove && topMoves[0] !== analysis.bestMove) {
      evaluationLogger.warn(
        { fen, bestMove: analysis.bestMove, topMove: topMoves[0] },
        'Engine bestmove differs from its top line'
      );
    }

    return {
      topMoves,
      bestScore: scoreToCentipawns(topLine.score),
      depth: analysis.depth,
    };
  }

  private async analyzeScore(engine: AnalysisEngine, fen: string): Promise<number> {
    const analysis = await engine.analyze(fen, {
      movetime: this.analysisTimeMs,
      multiPv: 1,
    });

    // Terminal positions come back with a score and no PV
    const [topLine] = analysis.lines;
    if (!topLine) {
      throw new EngineResponseError(ERROR_MESSAGES.UNEXPECTED_ANALYSIS, fen);
    }

    return scoreToCentipawns(topLine.score);
  }
}

function describeEngineFailure(error: unknown): { kind: EngineFailureKind; message: string } {
  if (error instanceof EngineUnavailableError) {
    return { kind: 'engine_unavailable', message: ERROR_MESSAGES.ENGINE_TERMINATED };
  }

  if (error instanceof EngineResponseError) {
    return { kind: 'engine_response_malformed', message: error.message };
  }

  const reason = error instanceof Error ? error.message : String(error);
  return { kind: 'engine_error', message: `${ERROR_MESSAGES.ENGINE_ERROR_PREFIX}${reason}` };
}

export const moveEvaluationService = new MoveEvaluationService();
