/**
 * Blunder Detector
 * Compares the mover's evaluation before and after a played move and, on a
 * blunder, surfaces the better moves the advisor would have played.
 *
 * A move that ranks first among all legal moves is never a blunder,
 * whatever the evaluation swing: nothing better was available.
 */

import { config } from '../../config/index.js';
import type { Position } from '../../engine/Position.js';
import { rulesOracle } from '../../engine/RulesOracle.js';
import type { RulesOracle } from '../../engine/RulesOracle.js';
import { BlendedEvaluator } from '../../evaluation/BlendedEvaluator.js';
import { MoveAdvisorService } from '../../services/MoveAdvisorService.js';
import type { BlunderReport, MoveCandidate } from '../../types/index.js';
import { InvalidPositionError } from '../../utils/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import { EvaluationUtils } from '../EvaluationUtils.js';
import { BLUNDER_THRESHOLDS, getBlunderSeverity } from './BlunderThresholds.js';

const blunderLogger = createChildLogger('BlunderDetector');

export interface BlunderOptions {
  /** Evaluation change below which a move is a blunder (default -2.0) */
  threshold?: number;
  /** How many better moves to list (default 3) */
  maxAlternatives?: number;
}

export interface BlunderDetectorDeps {
  oracle?: RulesOracle;
  evaluator?: BlendedEvaluator;
  advisor?: MoveAdvisorService;
}

export class BlunderDetector {
  private readonly oracle: RulesOracle;
  private readonly evaluator: BlendedEvaluator;
  private readonly advisor: MoveAdvisorService;

  constructor(deps: BlunderDetectorDeps = {}) {
    this.oracle = deps.oracle ?? rulesOracle;
    this.evaluator = deps.evaluator ?? new BlendedEvaluator({ oracle: this.oracle });
    this.advisor = deps.advisor ?? new MoveAdvisorService({ oracle: this.oracle, evaluator: this.evaluator });
  }

  /**
   * Main entry point - check a played move
   *
   * @param before - Position the move was played from
   * @param move - UCI or SAN notation
   * @param after - Resulting position, scored as given; derived from the move when omitted
   */
  checkBlunder(
    before: Position,
    move: string,
    after?: Position,
    options: BlunderOptions = {},
  ): BlunderReport {
    const played = this.oracle.parseMove(before, move);
    const derived = this.oracle.apply(before, played);

    if (after && !this.samePosition(after, derived)) {
      throw new InvalidPositionError(
        `Position after ${played.uci} does not follow from the position before it`,
        after.fen,
      );
    }

    const mover = before.sideToMove;
    const evalBefore = EvaluationUtils.toMoverPerspective(this.evaluator.evaluate(before).score, mover);
    // The caller's position carries its own move counters (fifty-move draws)
    const evalAfter = EvaluationUtils.toMoverPerspective(
      this.evaluator.evaluate(after ?? derived).score,
      mover,
    );
    const ranking = this.advisor.rankMoves(before);

    const report = this._buildReport(
      this.oracle.moveToNotation(played),
      evalBefore,
      evalAfter,
      ranking,
      options,
    );

    if (report.isBlunder) {
      blunderLogger.debug(
        { fen: before.fen, move: report.playedMove, delta: report.delta, severity: report.severity },
        'Blunder detected',
      );
    }
    return report;
  }

  /**
   * Check every legal move of a position and return the blunders among them
   */
  scanPosition(position: Position, options: BlunderOptions = {}): BlunderReport[] {
    const ranking = this.advisor.rankMoves(position);
    if (ranking.length === 0) return [];

    const evalBefore = EvaluationUtils.toMoverPerspective(
      this.evaluator.evaluate(position).score,
      position.sideToMove,
    );

    return ranking
      .map((candidate) =>
        this._buildReport(candidate.move, evalBefore, candidate.resultingScore, ranking, options),
      )
      .filter((report) => report.isBlunder);
  }

  private _buildReport(
    playedMove: string,
    evalBefore: number,
    evalAfter: number,
    ranking: readonly MoveCandidate[],
    options: BlunderOptions,
  ): BlunderReport {
    const threshold = options.threshold ?? config.blunderThreshold;
    const maxAlternatives = options.maxAlternatives ?? BLUNDER_THRESHOLDS.DEFAULT_ALTERNATIVES;
    const delta = evalAfter - evalBefore;
    const best = ranking[0];

    // An empty ranking means a finished game: nothing to compare against
    const isBestMove = best !== undefined && evalAfter >= best.resultingScore;
    const isBlunder = best !== undefined && !isBestMove && delta < threshold;

    const alternatives = isBlunder
      ? ranking
          .filter((c) => c.move !== playedMove && c.resultingScore > evalAfter)
          .slice(0, Math.max(0, maxAlternatives))
      : [];

    return {
      isBlunder,
      playedMove,
      evalBefore,
      evalAfter,
      delta,
      threshold,
      isBestMove,
      bestMove: best?.move ?? null,
      severity: isBlunder ? getBlunderSeverity(delta) : null,
      alternatives,
    };
  }

  /**
   * Same placement, side to move, castling and en passant; move counters may differ
   */
  private samePosition(a: Position, b: Position): boolean {
    const key = (p: Position) => this.oracle.toFen(p).split(' ').slice(0, 4).join(' ');
    return key(a) === key(b);
  }
}
