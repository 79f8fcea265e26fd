/**
 * Game-State Classifier
 * Maps rules-oracle signals to a reportable status tag.
 */

import type { Position } from '../engine/Position.js';
import { rulesOracle } from '../engine/RulesOracle.js';
import type { RulesOracle } from '../engine/RulesOracle.js';
import { GameState } from '../types/index.js';
import type { GameResult, PositionFlags } from '../types/index.js';

const TERMINAL_STATES: ReadonlySet<GameState> = new Set([
  GameState.CHECKMATE,
  GameState.STALEMATE,
  GameState.INSUFFICIENT_MATERIAL,
  GameState.DRAW,
]);

export class GameStateClassifier {
  constructor(private readonly oracle: RulesOracle = rulesOracle) {}

  /**
   * Precedence: checkmate, stalemate, insufficient material, other draws
   * (fifty-move rule, repetition), check, normal.
   */
  classify(position: Position): GameState {
    if (this.oracle.isCheckmate(position)) return GameState.CHECKMATE;
    if (this.oracle.isStalemate(position)) return GameState.STALEMATE;
    if (this.oracle.hasInsufficientMaterial(position)) return GameState.INSUFFICIENT_MATERIAL;
    if (this.oracle.isDraw(position)) return GameState.DRAW;
    if (this.oracle.isCheck(position)) return GameState.CHECK;
    return GameState.NORMAL;
  }

  /**
   * The mated side is the one to move; every other finished game is drawn
   */
  result(position: Position): GameResult | null {
    if (this.oracle.isCheckmate(position)) {
      return position.sideToMove === 'w' ? '0-1' : '1-0';
    }
    if (this.oracle.isDraw(position)) return '1/2-1/2';
    return null;
  }

  flags(position: Position): PositionFlags {
    return {
      isCheck: this.oracle.isCheck(position),
      isCheckmate: this.oracle.isCheckmate(position),
      isStalemate: this.oracle.isStalemate(position),
      isInsufficientMaterial: this.oracle.hasInsufficientMaterial(position),
    };
  }

  isTerminal(state: GameState): boolean {
    return TERMINAL_STATES.has(state);
  }
}
