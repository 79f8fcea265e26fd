/**
 * Heuristic Evaluator
 * Deterministic hand-weighted score: material plus positional terms.
 * Scores are in pawn units from White's perspective.
 */

import { DRAW_SCORE, HEURISTIC_WEIGHTS, MATE_SCORE } from '../config/constants.js';
import type { Position } from '../engine/Position.js';
import { rulesOracle } from '../engine/RulesOracle.js';
import type { RulesOracle } from '../engine/RulesOracle.js';
import { evaluationClassifier } from '../classifiers/EvaluationClassifier.js';
import { EvaluationSource } from '../types/index.js';
import type { EvaluationResult, HeuristicBreakdown } from '../types/index.js';
import { measurePosition } from './PositionMetrics.js';
import type { PositionMetrics } from './PositionMetrics.js';

const ZERO_TERMS = {
  material: 0,
  pieceSquare: 0,
  mobility: 0,
  kingSafety: 0,
  pawnStructure: 0,
  centerControl: 0,
} as const;

export class HeuristicEvaluator {
  constructor(private readonly oracle: RulesOracle = rulesOracle) {}

  evaluate(position: Position): EvaluationResult {
    const breakdown = this.breakdown(position);
    const { classification, advantage } = evaluationClassifier.classify(
      breakdown.total,
      breakdown.terminal === 'checkmate',
    );

    return {
      score: breakdown.total,
      classification,
      advantage,
      source: EvaluationSource.HEURISTIC,
      modelStatus: breakdown.terminal ? 'skipped_terminal' : 'not_consulted',
      heuristicScore: breakdown.total,
      learnedScore: null,
    };
  }

  breakdown(position: Position): HeuristicBreakdown {
    const terminal = this.terminalScore(position);
    if (terminal) return terminal;
    return this.fromMetrics(measurePosition(position, this.oracle));
  }

  /**
   * Rule-determined score for finished games, or null while play continues
   */
  terminalScore(position: Position): HeuristicBreakdown | null {
    if (this.oracle.isCheckmate(position)) {
      // The side to move has been mated
      const total = position.sideToMove === 'w' ? -MATE_SCORE : MATE_SCORE;
      return { ...ZERO_TERMS, total, terminal: 'checkmate' };
    }
    if (this.oracle.isDraw(position)) {
      return { ...ZERO_TERMS, total: DRAW_SCORE, terminal: 'draw' };
    }
    return null;
  }

  /**
   * Weighted sum over metrics already measured for a non-terminal position
   */
  fromMetrics(metrics: PositionMetrics): HeuristicBreakdown {
    const { white, black } = metrics;

    const material = HEURISTIC_WEIGHTS.MATERIAL * (white.material - black.material);
    const pieceSquare = HEURISTIC_WEIGHTS.PIECE_SQUARE * (white.pieceSquare - black.pieceSquare);
    const mobility = HEURISTIC_WEIGHTS.MOBILITY * (white.mobility - black.mobility);
    const kingSafety = HEURISTIC_WEIGHTS.KING_SAFETY * (white.kingSafety - black.kingSafety);
    const pawnStructure =
      HEURISTIC_WEIGHTS.PAWN_STRUCTURE * (white.pawnStructure - black.pawnStructure);
    const centerControl = HEURISTIC_WEIGHTS.CENTER_CONTROL * (white.center - black.center);

    return {
      material,
      pieceSquare,
      mobility,
      kingSafety,
      pawnStructure,
      centerControl,
      total: material + pieceSquare + mobility + kingSafety + pawnStructure + centerControl,
      terminal: null,
    };
  }
}
