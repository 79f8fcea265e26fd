/**
 * Position Analysis Service - The engine's public surface.
 * Every call is a pure function of its inputs plus the read-only model.
 */

import { config } from '../config/index.js';
import { getModelRegistry } from '../engine/ModelRegistry.js';
import type { ModelSource } from '../engine/ModelRegistry.js';
import type { Position } from '../engine/Position.js';
import { rulesOracle } from '../engine/RulesOracle.js';
import type { RulesOracle } from '../engine/RulesOracle.js';
import { BlendedEvaluator } from '../evaluation/BlendedEvaluator.js';
import type { BlendWeights } from '../evaluation/BlendedEvaluator.js';
import { LearnedEvaluator } from '../evaluation/LearnedEvaluator.js';
import { BlunderDetector } from '../classifiers/blunder/BlunderDetector.js';
import { GameStateClassifier } from '../classifiers/GameStateClassifier.js';
import type {
  BlunderReport,
  BlunderScanResult,
  EvaluationResult,
  GameState,
  GameStateSummary,
  MoveCandidate,
  PositionAnalysis,
} from '../types/index.js';
import { MoveAdvisorService } from './MoveAdvisorService.js';

export interface PositionAnalysisDeps {
  oracle?: RulesOracle;
  models?: ModelSource;
  weights?: BlendWeights;
}

export class PositionAnalysisService {
  private readonly evaluator: BlendedEvaluator;
  private readonly advisor: MoveAdvisorService;
  private readonly blunderDetector: BlunderDetector;
  private readonly stateClassifier: GameStateClassifier;
  private readonly oracle: RulesOracle;

  constructor(deps: PositionAnalysisDeps = {}) {
    const oracle = deps.oracle ?? rulesOracle;
    this.oracle = oracle;
    this.evaluator = new BlendedEvaluator({
      oracle,
      learned: new LearnedEvaluator(deps.models ?? getModelRegistry()),
      weights: deps.weights,
    });
    this.advisor = new MoveAdvisorService({ oracle, evaluator: this.evaluator });
    this.blunderDetector = new BlunderDetector({ oracle, evaluator: this.evaluator, advisor: this.advisor });
    this.stateClassifier = new GameStateClassifier(oracle);
  }

  evaluate(position: Position): EvaluationResult {
    return this.evaluator.evaluate(position);
  }

  suggestMoves(position: Position, k: number = config.defaultSuggestionCount): MoveCandidate[] {
    return this.advisor.suggestMoves(position, k);
  }

  checkBlunder(
    before: Position,
    move: string,
    after?: Position,
    threshold: number = config.blunderThreshold,
  ): BlunderReport {
    return this.blunderDetector.checkBlunder(before, move, after, { threshold });
  }

  classifyState(position: Position): GameState {
    return this.stateClassifier.classify(position);
  }

  describeState(position: Position): GameStateSummary {
    const state = this.stateClassifier.classify(position);
    return {
      state,
      isGameOver: this.stateClassifier.isTerminal(state),
      result: this.stateClassifier.result(position),
      legalMoves: this.oracle.legalMoves(position).map((m) => this.oracle.moveToNotation(m)),
    };
  }

  /**
   * Everything a presentation layer needs about one position
   */
  analyzePosition(position: Position, k: number = config.defaultSuggestionCount): PositionAnalysis {
    const { evaluation, breakdown } = this.evaluator.evaluateDetailed(position);

    return {
      fen: position.fen,
      sideToMove: position.sideToMove,
      ...this.describeState(position),
      flags: this.stateClassifier.flags(position),
      evaluation,
      breakdown,
      suggestions: this.advisor.suggestMoves(position, k),
    };
  }

  scanForBlunders(position: Position, threshold: number = config.blunderThreshold): BlunderScanResult {
    return {
      fen: position.fen,
      threshold,
      blunders: this.blunderDetector.scanPosition(position, { threshold }),
    };
  }
}

// Singleton instance
let globalService: PositionAnalysisService | null = null;

export function getPositionAnalysisService(): PositionAnalysisService {
  if (!globalService) {
    globalService = new PositionAnalysisService();
  }
  return globalService;
}
