import { describe, it, expect } from 'vitest';

import { EvaluationClassifier } from '../EvaluationClassifier.js';
import { EvaluationUtils } from '../EvaluationUtils.js';
import { EvaluationClass } from '../../types/index.js';

describe('EvaluationClassifier', () => {
  const classifier = new EvaluationClassifier();

  it.each([
    [0, EvaluationClass.EQUAL, null],
    [0.99, EvaluationClass.EQUAL, null],
    [-0.5, EvaluationClass.EQUAL, null],
    [1.0, EvaluationClass.SLIGHT_ADVANTAGE, 'white'],
    [-1.49, EvaluationClass.SLIGHT_ADVANTAGE, 'black'],
    [1.5, EvaluationClass.ADVANTAGE, 'white'],
    [3.0, EvaluationClass.ADVANTAGE, 'white'],
    [3.01, EvaluationClass.WINNING, 'white'],
    [-50, EvaluationClass.WINNING, 'black'],
  ] as const)('should classify %s as %s', (score, classification, advantage) => {
    expect(classifier.classify(score, false)).toEqual({ classification, advantage });
  });

  it('should only report MATE for an actual checkmate', () => {
    expect(classifier.classify(10000, true)).toEqual({
      classification: EvaluationClass.MATE,
      advantage: 'white',
    });
    expect(classifier.classify(-10000, true).advantage).toBe('black');
    expect(classifier.classify(10000, false).classification).toBe(EvaluationClass.WINNING);
  });
});

describe('EvaluationUtils', () => {
  it('should flip scores for Black', () => {
    expect(EvaluationUtils.toMoverPerspective(1.5, 'w')).toBe(1.5);
    expect(EvaluationUtils.toMoverPerspective(1.5, 'b')).toBe(-1.5);
    expect(Object.is(EvaluationUtils.toMoverPerspective(0, 'b'), 0)).toBe(true);
  });
});
