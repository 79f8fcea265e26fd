/**
 * Move Advisor - Ranks every legal move by the blended evaluation of the
 * position it leads to.
 */

import { config } from '../config/index.js';
import type { Position } from '../engine/Position.js';
import { rulesOracle } from '../engine/RulesOracle.js';
import type { RulesOracle } from '../engine/RulesOracle.js';
import { BlendedEvaluator } from '../evaluation/BlendedEvaluator.js';
import { EvaluationUtils } from '../classifiers/EvaluationUtils.js';
import { GameStateClassifier } from '../classifiers/GameStateClassifier.js';
import type { MoveCandidate } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';

const advisorLogger = createChildLogger('MoveAdvisor');

export interface MoveAdvisorOptions {
  oracle?: RulesOracle;
  evaluator?: BlendedEvaluator;
}

export class MoveAdvisorService {
  private readonly oracle: RulesOracle;
  private readonly evaluator: BlendedEvaluator;
  private readonly stateClassifier: GameStateClassifier;

  constructor(options: MoveAdvisorOptions = {}) {
    this.oracle = options.oracle ?? rulesOracle;
    this.evaluator = options.evaluator ?? new BlendedEvaluator({ oracle: this.oracle });
    this.stateClassifier = new GameStateClassifier(this.oracle);
  }

  /**
   * Best `k` moves, best first
   */
  suggestMoves(position: Position, k: number = config.defaultSuggestionCount): MoveCandidate[] {
    if (k < 1) return [];
    return this.rankMoves(position).slice(0, Math.floor(k));
  }

  /**
   * Every legal move, best first. Scores are normalized to the side to move;
   * equal scores keep the oracle's enumeration order.
   * Finished games return an empty list without scoring anything.
   */
  rankMoves(position: Position): MoveCandidate[] {
    const state = this.stateClassifier.classify(position);
    if (this.stateClassifier.isTerminal(state)) {
      advisorLogger.debug({ fen: position.fen, state }, 'Terminal position, no candidates');
      return [];
    }

    const mover = position.sideToMove;
    const current = EvaluationUtils.toMoverPerspective(this.evaluator.evaluate(position).score, mover);

    const candidates = this.oracle.legalMoves(position).map((move): MoveCandidate => {
      const evaluation = this.evaluator.evaluate(this.oracle.apply(position, move));
      const resultingScore = EvaluationUtils.toMoverPerspective(evaluation.score, mover);
      return {
        move: this.oracle.moveToNotation(move),
        san: move.san,
        resultingScore,
        deltaFromCurrent: resultingScore - current,
        source: evaluation.source,
      };
    });

    // Array.prototype.sort is stable, which keeps ties in oracle order
    return candidates.sort((a, b) => b.resultingScore - a.resultingScore);
  }
}
