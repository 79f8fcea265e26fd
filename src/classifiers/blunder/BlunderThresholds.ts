/**
 * Blunder Detection Thresholds
 * All values are pawn units from the mover's perspective.
 */

import type { BlunderSeverity } from '../../types/index.js';

export const BLUNDER_THRESHOLDS = {
  /** Better moves listed with a blunder */
  DEFAULT_ALTERNATIVES: 3,

  // ===========================================
  // Severity bands (evaluation change)
  // ===========================================

  /** Roughly a queen or more */
  CRITICAL_DELTA: -7.0,

  /** Roughly a rook or more */
  SEVERE_DELTA: -4.0,
} as const;

/**
 * Severity of a blunder from its evaluation change
 */
export function getBlunderSeverity(delta: number): BlunderSeverity {
  if (delta <= BLUNDER_THRESHOLDS.CRITICAL_DELTA) return 'critical';
  if (delta <= BLUNDER_THRESHOLDS.SEVERE_DELTA) return 'severe';
  return 'serious';
}
