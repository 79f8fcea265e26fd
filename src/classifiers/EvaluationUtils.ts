/**
 * Utility functions for evaluation handling
 */

import type { Side } from '../types/index.js';

export class EvaluationUtils {
  /**
   * Convert a White-perspective score to the given side's perspective.
   * Never returns -0, so equal scores compare equal under Object.is.
   */
  static toMoverPerspective(score: number, side: Side): number {
    return (side === 'w' ? score : -score) + 0;
  }
}
