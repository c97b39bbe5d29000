/**
 * Maps centipawn loss to a move quality label
 */

import type { MoveQuality } from '../types/index.js';
import { MOVE_QUALITY_THRESHOLDS } from '../config/constants.js';

/**
 * Negative loss (the move beat the engine's choice at this depth) is not
 * clamped and lands in the Excellent band.
 */
export function describeQuality(loss: number): MoveQuality {
  if (loss < MOVE_QUALITY_THRESHOLDS.EXCELLENT) {
    return 'Excellent';
  }
  if (loss < MOVE_QUALITY_THRESHOLDS.GOOD) {
    return 'Good';
  }
  if (loss < MOVE_QUALITY_THRESHOLDS.INACCURACY) {
    return 'Inaccuracy';
  }
  if (loss < MOVE_QUALITY_THRESHOLDS.MISTAKE) {
    return 'Mistake';
  }
  return 'Blunder';
}
