/**
 * Maps a numeric score to an evaluation band.
 * MATE comes only from the rules oracle's checkmate verdict, never from magnitude.
 */

import { EVALUATION_THRESHOLDS } from '../config/constants.js';
import { EvaluationClass } from '../types/index.js';

export interface ScoreClassification {
  classification: EvaluationClass;
  advantage: 'white' | 'black' | null;
}

export class EvaluationClassifier {
  classify(score: number, isCheckmate: boolean): ScoreClassification {
    const advantage = score > 0 ? 'white' : score < 0 ? 'black' : null;

    if (isCheckmate) {
      return { classification: EvaluationClass.MATE, advantage };
    }

    const magnitude = Math.abs(score);
    if (magnitude < EVALUATION_THRESHOLDS.EQUAL) {
      return { classification: EvaluationClass.EQUAL, advantage: null };
    }
    if (magnitude < EVALUATION_THRESHOLDS.SLIGHT_ADVANTAGE) {
      return { classification: EvaluationClass.SLIGHT_ADVANTAGE, advantage };
    }
    if (magnitude <= EVALUATION_THRESHOLDS.ADVANTAGE) {
      return { classification: EvaluationClass.ADVANTAGE, advantage };
    }
    return { classification: EvaluationClass.WINNING, advantage };
  }
}

export const evaluationClassifier = new EvaluationClassifier();
