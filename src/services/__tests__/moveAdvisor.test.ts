import { describe, it, expect } from 'vitest';

import { MoveAdvisorService } from '../MoveAdvisorService.js';
import { MATE_SCORE } from '../../config/constants.js';
import { Position } from '../../engine/Position.js';
import { rulesOracle } from '../../engine/RulesOracle.js';
import { BlendedEvaluator } from '../../evaluation/BlendedEvaluator.js';
import { LearnedEvaluator } from '../../evaluation/LearnedEvaluator.js';
import { EvaluationSource } from '../../types/index.js';
import type { MoveCandidate } from '../../types/index.js';
import { FENS, QUEEN_MATES, noModels, scholarsMate } from '../../__tests__/fixtures.js';

const evaluator = new BlendedEvaluator({ learned: new LearnedEvaluator(noModels) });
const advisor = new MoveAdvisorService({ evaluator });

function expectBestFirst(candidates: readonly MoveCandidate[]): void {
  for (let i = 1; i < candidates.length; i++) {
    expect(candidates[i - 1].resultingScore).toBeGreaterThanOrEqual(candidates[i].resultingScore);
  }
}

describe('MoveAdvisorService', () => {
  it('should return the k best moves, best first', () => {
    const suggestions = advisor.suggestMoves(Position.start(), 3);

    expect(suggestions).toHaveLength(3);
    expectBestFirst(suggestions);
    expect(suggestions.every((s) => s.source === EvaluationSource.HEURISTIC)).toBe(true);
  });

  it('should cap k at the number of legal moves', () => {
    const suggestions = advisor.suggestMoves(Position.start(), 100);
    expect(suggestions).toHaveLength(20);
    expectBestFirst(suggestions);
  });

  it('should return nothing for k below one', () => {
    expect(advisor.suggestMoves(Position.start(), 0)).toEqual([]);
    expect(advisor.suggestMoves(Position.start(), -3)).toEqual([]);
  });

  it('should floor fractional k', () => {
    expect(advisor.suggestMoves(Position.start(), 2.7)).toHaveLength(2);
  });

  it('should be deterministic', () => {
    const position = Position.fromFen(FENS.afterE4);
    expect(advisor.suggestMoves(position, 5)).toEqual(advisor.suggestMoves(position, 5));
  });

  it('should return nothing for finished games', () => {
    expect(advisor.suggestMoves(scholarsMate(), 3)).toEqual([]);
    expect(advisor.suggestMoves(Position.fromFen(FENS.stalemate), 3)).toEqual([]);
    expect(advisor.suggestMoves(Position.fromFen(FENS.kingsOnly), 3)).toEqual([]);
  });

  it('should score from the side to move', () => {
    const position = Position.fromFen(FENS.afterE4);
    const current = -evaluator.evaluate(position).score;
    const [top] = advisor.suggestMoves(position, 1);

    const move = rulesOracle.parseMove(position, top.move);
    const whiteScore = evaluator.evaluate(rulesOracle.apply(position, move)).score;

    expect(top.resultingScore).toBeCloseTo(-whiteScore, 10);
    expect(top.deltaFromCurrent).toBeCloseTo(top.resultingScore - current, 10);
    expect(top.san).toBe(move.san);
  });

  it('should rank mirrored positions identically', () => {
    const scores = advisor.rankMoves(Position.fromFen(FENS.afterE4)).map((c) => c.resultingScore);
    const mirrored = advisor
      .rankMoves(Position.fromFen(FENS.afterE4Mirrored))
      .map((c) => c.resultingScore);

    expect(mirrored).toHaveLength(scores.length);
    scores.forEach((score, i) => expect(mirrored[i]).toBeCloseTo(score, 10));
  });

  it('should put a mating move first', () => {
    const [top] = advisor.suggestMoves(Position.fromFen(FENS.queenMating), 1);

    expect(QUEEN_MATES).toContain(top.move);
    expect(top.resultingScore).toBe(MATE_SCORE);
  });

  it('should rank every mating move above the rest', () => {
    const top = advisor.suggestMoves(Position.fromFen(FENS.queenMating), QUEEN_MATES.length);

    expect(top.map((c) => c.move).sort()).toEqual([...QUEEN_MATES].sort());
    expect(top.every((c) => c.resultingScore === MATE_SCORE)).toBe(true);
  });
});
