/**
 * Position helpers on top of chess.js
 */

import { Chess, validateFen, type Move } from 'chess.js';
import type { PlayerColor } from '../types/index.js';

export class InvalidFenError extends Error {
  constructor(
    public readonly fen: string,
    reason?: string
  ) {
    // chess.js reasons already carry the prefix
    super(reason?.startsWith('Invalid FEN') ? reason : `Invalid FEN: ${reason ?? fen}`);
    this.name = 'InvalidFenError';
  }
}

const FEN_FIELD_DEFAULTS = ['-', '-', '0', '1'];

/**
 * Fill in trailing castling, en passant and move counter fields the way
 * chess.js `load` does, so `... w KQkq -` reads as `... w KQkq - 0 1`.
 * Strings with fewer than two fields, or all six, are returned unchanged.
 */
export function completeFen(fen: string): string {
  const fields = fen.trim().split(/\s+/);
  if (fields.length < 2 || fields.length >= 6) {
    return fen;
  }
  return [...fields, ...FEN_FIELD_DEFAULTS.slice(fields.length - 2)].join(' ');
}

export function parsePosition(fen: string): Chess {
  const completed = completeFen(fen);
  const validation = validateFen(completed);
  if (!validation.ok) {
    throw new InvalidFenError(fen, validation.error);
  }
  return new Chess(completed);
}

export function sideToMove(chess: Chess): PlayerColor {
  return chess.turn() === 'w' ? 'white' : 'black';
}

/**
 * Resolve move text against the position without playing it.
 * Exact SAN is tried first, then chess.js' permissive parser (coordinate
 * text, over-disambiguated SAN). A permissive match that leaves the
 * origin square open between several pieces counts as ambiguous.
 * Null when ambiguous, malformed or illegal.
 */
export function resolveMove(chess: Chess, moveText: string): Move | null {
  const strict = tryMove(chess, moveText, true);
  if (strict) {
    return strict;
  }

  const permissive = tryMove(chess, moveText, false);
  if (!permissive) {
    return null;
  }

  const candidates = chess
    .moves({ verbose: true })
    .filter(
      (m) =>
        m.piece === permissive.piece &&
        m.to === permissive.to &&
        m.promotion === permissive.promotion
    );

  if (candidates.length > 1 && !moveText.includes(permissive.from)) {
    return null;
  }

  return permissive;
}

function tryMove(chess: Chess, moveText: string, strict: boolean): Move | null {
  try {
    const move = chess.move(moveText, { strict });
    chess.undo();
    return move;
  } catch {
    return null;
  }
}

export function toUci(move: Pick<Move, 'from' | 'to' | 'promotion'>): string {
  return `${move.from}${move.to}${move.promotion ?? ''}`;
}
