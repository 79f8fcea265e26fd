/**
 * Feature Extractor
 * Converts a position into the fixed-order feature vector learned models consume.
 */

import { FEATURE_NAMES, FEATURE_SCHEMA_VERSION } from '../config/constants.js';
import type { FeatureName } from '../config/constants.js';
import type { Position } from '../engine/Position.js';
import { rulesOracle } from '../engine/RulesOracle.js';
import type { RulesOracle } from '../engine/RulesOracle.js';
import type { FeatureVector } from '../types/index.js';
import { measurePosition } from './PositionMetrics.js';
import type { PositionMetrics } from './PositionMetrics.js';

export class FeatureExtractor {
  constructor(private readonly oracle: RulesOracle = rulesOracle) {}

  extract(position: Position): FeatureVector {
    return this.fromMetrics(measurePosition(position, this.oracle));
  }

  /**
   * Build the vector from metrics already measured for this position
   */
  fromMetrics(metrics: PositionMetrics): FeatureVector {
    const { white, black } = metrics;

    const byName: Record<FeatureName, number> = {
      material_balance: white.material - black.material,
      mobility_white: white.mobility,
      mobility_black: black.mobility,
      king_safety_white: white.kingSafety,
      king_safety_black: black.kingSafety,
      pawn_structure_score: white.pawnStructure - black.pawnStructure,
      piece_square_balance: white.pieceSquare - black.pieceSquare,
      center_control: white.center - black.center,
      game_phase: metrics.pieceCount / 32,
      side_to_move: metrics.sideToMove === 'w' ? 1 : -1,
    };

    return {
      schemaVersion: FEATURE_SCHEMA_VERSION,
      names: FEATURE_NAMES,
      values: FEATURE_NAMES.map((name) => byName[name]),
    };
  }
}
