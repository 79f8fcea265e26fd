/**
 * Blended Evaluator
 * score = w_ml * learned + w_heuristic * heuristic, falling back to the
 * heuristic alone (source HEURISTIC) whenever the model cannot answer.
 */

import { config } from '../config/index.js';
import type { Position } from '../engine/Position.js';
import { rulesOracle } from '../engine/RulesOracle.js';
import type { RulesOracle } from '../engine/RulesOracle.js';
import { evaluationClassifier } from '../classifiers/EvaluationClassifier.js';
import { EvaluationSource } from '../types/index.js';
import type { EvaluationResult, HeuristicBreakdown } from '../types/index.js';
import { FeatureExtractor } from './FeatureExtractor.js';
import { HeuristicEvaluator } from './HeuristicEvaluator.js';
import { LearnedEvaluator } from './LearnedEvaluator.js';
import { measurePosition } from './PositionMetrics.js';

export interface BlendWeights {
  readonly ml: number;
  readonly heuristic: number;
}

export const DEFAULT_BLEND_WEIGHTS: BlendWeights = {
  ml: config.blendMlWeight,
  heuristic: config.blendHeuristicWeight,
};

export interface BlendedEvaluatorOptions {
  oracle?: RulesOracle;
  learned?: LearnedEvaluator;
  weights?: BlendWeights;
}

export interface DetailedEvaluation {
  evaluation: EvaluationResult;
  breakdown: HeuristicBreakdown;
}

export class BlendedEvaluator {
  private readonly oracle: RulesOracle;
  private readonly heuristic: HeuristicEvaluator;
  private readonly features: FeatureExtractor;
  private readonly learned: LearnedEvaluator;
  readonly weights: BlendWeights;

  constructor(options: BlendedEvaluatorOptions = {}) {
    this.oracle = options.oracle ?? rulesOracle;
    this.heuristic = new HeuristicEvaluator(this.oracle);
    this.features = new FeatureExtractor(this.oracle);
    this.learned = options.learned ?? new LearnedEvaluator();
    this.weights = options.weights ?? DEFAULT_BLEND_WEIGHTS;
  }

  evaluate(position: Position): EvaluationResult {
    return this.evaluateDetailed(position).evaluation;
  }

  /**
   * Evaluation plus the heuristic terms behind it
   */
  evaluateDetailed(position: Position): DetailedEvaluation {
    // Finished games are scored by the rules; the model never sees them
    const terminal = this.heuristic.terminalScore(position);
    if (terminal) {
      return {
        evaluation: this.buildResult(terminal.total, terminal.terminal === 'checkmate', {
          source: EvaluationSource.HEURISTIC,
          modelStatus: 'skipped_terminal',
          heuristicScore: terminal.total,
          learnedScore: null,
        }),
        breakdown: terminal,
      };
    }

    const metrics = measurePosition(position, this.oracle);
    const breakdown = this.heuristic.fromMetrics(metrics);
    const prediction = this.learned.predict(this.features.fromMetrics(metrics));

    if (prediction.status === 'unavailable') {
      return {
        evaluation: this.buildResult(breakdown.total, false, {
          source: EvaluationSource.HEURISTIC,
          modelStatus: prediction.reason,
          heuristicScore: breakdown.total,
          learnedScore: null,
        }),
        breakdown,
      };
    }

    const score = this.weights.ml * prediction.score + this.weights.heuristic * breakdown.total;
    return {
      evaluation: this.buildResult(score, false, {
        source: EvaluationSource.BLENDED,
        modelStatus: 'used',
        heuristicScore: breakdown.total,
        learnedScore: prediction.score,
      }),
      breakdown,
    };
  }

  private buildResult(
    score: number,
    isCheckmate: boolean,
    provenance: Pick<EvaluationResult, 'source' | 'modelStatus' | 'heuristicScore' | 'learnedScore'>,
  ): EvaluationResult {
    const { classification, advantage } = evaluationClassifier.classify(score, isCheckmate);
    return { score, classification, advantage, ...provenance };
  }
}
