/**
 * Evaluation Constants - All scores are in pawn units (1.0 = one pawn)
 * from White's perspective unless stated otherwise.
 */

import type { PieceSymbol } from 'chess.js';

// ═══════════════════════════════════════════════════════════════════════
// MATERIAL
// ═══════════════════════════════════════════════════════════════════════

/**
 * Standard piece values. The king carries no material weight: both sides
 * always have exactly one.
 */
export const PIECE_VALUES: Readonly<Record<PieceSymbol, number>> = {
  p: 1.0,
  n: 3.2,
  b: 3.3,
  r: 5.0,
  q: 9.0,
  k: 0,
};

/** Score assigned to a checkmated position (sign against the mated side) */
export const MATE_SCORE = 10000;

/** Score assigned to stalemate, insufficient material and other draws */
export const DRAW_SCORE = 0;

// ═══════════════════════════════════════════════════════════════════════
// HEURISTIC WEIGHTS (fixed, not learned)
// ═══════════════════════════════════════════════════════════════════════

export const HEURISTIC_WEIGHTS = {
  MATERIAL: 1.0,
  PIECE_SQUARE: 1.0,
  MOBILITY: 0.05, // per legal move of difference
  KING_SAFETY: 0.5,
  PAWN_STRUCTURE: 1.0,
  CENTER_CONTROL: 0.1, // per occupied centre square of difference
} as const;

/**
 * Inputs of the king safety and pawn structure terms
 */
export const POSITIONAL_TERMS = {
  /** Bonus per own pawn directly shielding the king */
  KING_SHIELD_PAWN: 0.2,
  /** Penalty per square next to the king attacked by the enemy */
  KING_ZONE_ATTACKED: 0.15,
  /** Penalty for each extra pawn on a file */
  DOUBLED_PAWN: 0.15,
  /** Penalty for a pawn with no friendly pawn on an adjacent file */
  ISOLATED_PAWN: 0.1,
  /** Bonus for a pawn with no enemy pawn ahead on its own or adjacent files */
  PASSED_PAWN: 0.2,
} as const;

/** A position with this many pieces (kings included) or fewer is an endgame */
export const ENDGAME_PIECE_COUNT = 12;

/** Squares counted by the centre control term */
export const CENTER_SQUARES = ['d4', 'e4', 'd5', 'e5'] as const;

// ═══════════════════════════════════════════════════════════════════════
// EVALUATION CLASSIFICATION (absolute score, pawn units)
// ═══════════════════════════════════════════════════════════════════════

export const EVALUATION_THRESHOLDS = {
  EQUAL: 1.0, // |score| < 1.0
  SLIGHT_ADVANTAGE: 1.5, // 1.0 <= |score| < 1.5
  ADVANTAGE: 3.0, // 1.5 <= |score| <= 3.0, WINNING above
} as const;

// ═══════════════════════════════════════════════════════════════════════
// FEATURE SCHEMA
// ═══════════════════════════════════════════════════════════════════════

export const FEATURE_SCHEMA_VERSION = 'v1';

/**
 * Feature order consumed by learned models. Changing it requires a new
 * schema version and retrained artifacts.
 */
export const FEATURE_NAMES = [
  'material_balance',
  'mobility_white',
  'mobility_black',
  'king_safety_white',
  'king_safety_black',
  'pawn_structure_score',
  'piece_square_balance',
  'center_control',
  'game_phase',
  'side_to_move',
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];
