/**
 * Parsing of UCI engine output lines
 */

import type { EngineLine, Score } from '../types/index.js';
import { mateToCentipawns } from '../config/constants.js';

/**
 * Parse an `info` line carrying a score.
 * Lines without a score (currmove, string, hashfull...) return null.
 * A PV is optional: terminal positions report `score mate 0` or `score cp 0` alone.
 */
export function parseInfoLine(line: string): EngineLine | null {
  if (!line.startsWith('info ') || line.startsWith('info string')) {
    return null;
  }

  const scoreMatch = line.match(/ score (cp|mate) (-?\d+)/);
  if (!scoreMatch) {
    return null;
  }

  const depthMatch = line.match(/ depth (\d+)/);
  const pvMatch = line.match(/ multipv (\d+)/);
  const pvMovesMatch = line.match(/ pv (.+)$/);

  const score: Score = {
    type: scoreMatch[1] === 'mate' ? 'mate' : 'cp',
    value: parseInt(scoreMatch[2], 10),
  };

  return {
    multipv: pvMatch ? parseInt(pvMatch[1], 10) : 1,
    depth: depthMatch ? parseInt(depthMatch[1], 10) : 0,
    score,
    pv: pvMovesMatch ? pvMovesMatch[1].trim().split(/\s+/) : [],
  };
}

export function isBestMoveLine(line: string): boolean {
  return line.startsWith('bestmove');
}

/**
 * Move from a `bestmove` line, or null when the engine has none to offer
 */
export function parseBestMove(line: string): string | null {
  const moveMatch = line.match(/^bestmove (\S+)/);
  if (!moveMatch || moveMatch[1] === '(none)') {
    return null;
  }
  return moveMatch[1];
}

export function scoreToCentipawns(score: Score): number {
  return score.type === 'mate' ? mateToCentipawns(score.value) : score.value;
}
