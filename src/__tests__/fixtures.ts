/**
 * Shared positions and model stubs for tests
 */

import { FEATURE_NAMES, FEATURE_SCHEMA_VERSION } from '../config/constants.js';
import type { ModelSource, ModelState } from '../engine/ModelRegistry.js';
import { Position } from '../engine/Position.js';
import { rulesOracle } from '../engine/RulesOracle.js';
import type { FeatureVector, ModelArtifact } from '../types/index.js';

export const FENS = {
  afterE4: 'rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq - 0 1',
  /** Colour-flipped mirror of afterE4 */
  afterE4Mirrored: 'rnbqkbnr/pppp1ppp/8/4p3/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1',
  kingsOnly: '4k3/8/8/8/8/8/8/4K3 w - - 0 1',
  kingAndBishop: '4k3/8/8/8/8/8/8/4KB2 w - - 0 1',
  queenUp: '4k3/8/8/8/8/8/8/3QK3 w - - 0 1',
  stalemate: '7k/5Q2/6K1/8/8/8/8/8 b - - 0 1',
  check: '4k3/8/8/8/8/8/8/4R1K1 b - - 0 1',
  fiftyMoves: '4k3/8/8/8/8/8/8/R3K3 w - - 100 80',
  /** White to move: Qf7/Qe6 stalemate, Qd8/Qe8/Qf8/Qg7/Qh7 mate */
  queenMating: '7k/4Q3/6K1/8/8/8/8/8 w - - 0 1',
  pawnIslands: '4k3/8/8/8/8/P7/P1P5/4K3 w - - 0 1',
} as const;

export const QUEEN_MATES = ['e7d8', 'e7e8', 'e7f8', 'e7g7', 'e7h7'];

export function play(start: Position, moves: readonly string[]): Position {
  return moves.reduce(
    (position, move) => rulesOracle.apply(position, rulesOracle.parseMove(position, move)),
    start,
  );
}

/** 1.e4 e5 2.Bc4 Nc6 3.Qh5 Nf6 4.Qxf7# */
export function scholarsMate(): Position {
  return play(Position.start(), ['e2e4', 'e7e5', 'f1c4', 'b8c6', 'd1h5', 'g8f6', 'h5f7']);
}

export function constantModel(score: number): ModelArtifact {
  return {
    schemaVersion: FEATURE_SCHEMA_VERSION,
    featureNames: [...FEATURE_NAMES],
    predict: (_features: FeatureVector) => score,
  };
}

export function readyModels(model: ModelArtifact): ModelSource {
  return { getState: (): ModelState => ({ status: 'ready', model, source: 'test' }) };
}

export const noModels: ModelSource = {
  getState: (): ModelState => ({ status: 'uninitialized' }),
};
