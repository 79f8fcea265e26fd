/**
 * Type definitions for position evaluation and move advice
 */

import type { FeatureName } from '../config/constants.js';

/**
 * Side of the board, as chess.js names it
 */
export type Side = 'w' | 'b';

/**
 * Evaluation bands, from balanced to decided
 */
export enum EvaluationClass {
  EQUAL = 'EQUAL',
  SLIGHT_ADVANTAGE = 'SLIGHT_ADVANTAGE',
  ADVANTAGE = 'ADVANTAGE',
  WINNING = 'WINNING',
  MATE = 'MATE',
}

/**
 * Which evaluator produced the final score
 */
export enum EvaluationSource {
  HEURISTIC = 'HEURISTIC',
  BLENDED = 'BLENDED',
}

/**
 * Status tag reported alongside every evaluation
 */
export enum GameState {
  NORMAL = 'NORMAL',
  CHECK = 'CHECK',
  CHECKMATE = 'CHECKMATE',
  STALEMATE = 'STALEMATE',
  INSUFFICIENT_MATERIAL = 'INSUFFICIENT_MATERIAL',
  DRAW = 'DRAW',
}

/**
 * Why the learned model did not contribute to a score
 */
export type ModelUnavailableReason =
  | 'not_loaded'
  | 'load_failed'
  | 'schema_mismatch'
  | 'prediction_failed';

/** `not_consulted`: the heuristic was asked directly, without the blend */
export type ModelStatus = 'used' | 'skipped_terminal' | 'not_consulted' | ModelUnavailableReason;

/**
 * Legal move as reported by the rules oracle
 */
export interface Move {
  readonly from: string;
  readonly to: string;
  readonly promotion?: string;
  /** Long algebraic notation, e.g. "e2e4", "e7e8q" */
  readonly uci: string;
  readonly san: string;
}

/**
 * Numeric summary of a position, in schema order
 */
export interface FeatureVector {
  readonly schemaVersion: string;
  readonly names: readonly FeatureName[];
  readonly values: readonly number[];
}

/**
 * Trained model consumed by the learned evaluator.
 * Loaded once, never mutated.
 */
export interface ModelArtifact {
  readonly schemaVersion: string;
  readonly featureNames: readonly string[];
  predict(features: FeatureVector): number;
}

/**
 * Learned evaluator output: a score or an explicit "unavailable" signal
 */
export type LearnedPrediction =
  | { status: 'ok'; score: number }
  | { status: 'unavailable'; reason: ModelUnavailableReason; detail?: string };

export interface EvaluationResult {
  /** Pawn units, positive favours White */
  readonly score: number;
  readonly classification: EvaluationClass;
  /** Side favoured by the score, null when EQUAL */
  readonly advantage: 'white' | 'black' | null;
  readonly source: EvaluationSource;
  readonly modelStatus: ModelStatus;
  readonly heuristicScore: number;
  readonly learnedScore: number | null;
}

/**
 * Named terms of the heuristic score (White's perspective)
 */
export interface HeuristicBreakdown {
  readonly material: number;
  readonly pieceSquare: number;
  readonly mobility: number;
  readonly kingSafety: number;
  readonly pawnStructure: number;
  readonly centerControl: number;
  readonly total: number;
  /** Set when the rules decided the score */
  readonly terminal: 'checkmate' | 'draw' | null;
}

export interface MoveCandidate {
  readonly move: string;
  readonly san: string;
  /** Score after the move, from the mover's perspective */
  readonly resultingScore: number;
  readonly deltaFromCurrent: number;
  readonly source: EvaluationSource;
}

export type BlunderSeverity = 'critical' | 'severe' | 'serious';

export interface BlunderReport {
  readonly isBlunder: boolean;
  readonly playedMove: string;
  /** Mover's perspective */
  readonly evalBefore: number;
  /** Mover's perspective */
  readonly evalAfter: number;
  readonly delta: number;
  readonly threshold: number;
  readonly isBestMove: boolean;
  readonly bestMove: string | null;
  readonly severity: BlunderSeverity | null;
  readonly alternatives: readonly MoveCandidate[];
}

export interface PositionFlags {
  readonly isCheck: boolean;
  readonly isCheckmate: boolean;
  readonly isStalemate: boolean;
  readonly isInsufficientMaterial: boolean;
}

/** PGN result of a finished game */
export type GameResult = '1-0' | '0-1' | '1/2-1/2';

export interface GameStateSummary {
  readonly state: GameState;
  readonly isGameOver: boolean;
  /** null while the game is still running */
  readonly result: GameResult | null;
  /** UCI notation, in the oracle's order */
  readonly legalMoves: readonly string[];
}

export interface PositionAnalysis extends GameStateSummary {
  readonly fen: string;
  readonly sideToMove: Side;
  readonly flags: PositionFlags;
  readonly evaluation: EvaluationResult;
  readonly breakdown: HeuristicBreakdown;
  readonly suggestions: readonly MoveCandidate[];
}

export interface BlunderScanResult {
  readonly fen: string;
  readonly threshold: number;
  readonly blunders: readonly BlunderReport[];
}

// ═══════════════════════════════════════════════════════════════════════
// API Types
// ═══════════════════════════════════════════════════════════════════════

/**
 * Health check response
 */
export interface HealthResponse {
  status: 'healthy' | 'degraded';
  model: 'ready' | 'loading' | 'unavailable';
  modelReason?: ModelUnavailableReason;
  uptime: number;
  version: string;
}
