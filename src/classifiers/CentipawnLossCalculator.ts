/**
 * Calculates centipawn loss from the mover's point of view
 */

import type { PlayerColor } from '../types/index.js';

/**
 * @param bestScore - engine score of its top line, relative to the mover
 * @param actualScore - engine score after the played move, relative to the opponent
 */
export function calculateCentipawnLoss(
  color: PlayerColor,
  bestScore: number,
  actualScore: number
): number {
  if (color === 'white') {
    // For white: loss = best eval - actual eval after move
    return bestScore - actualScore;
  }

  // For black: loss = actual eval after move - best eval (inverted perspective)
  return actualScore - bestScore;
}
