/**
 * Position - Immutable board state parsed from FEN
 */

import { Chess } from 'chess.js';
import type { Square } from 'chess.js';
import type { Side } from '../types/index.js';
import { InvalidPositionError } from '../utils/errors.js';

export const START_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

export class Position {
  private constructor(
    readonly fen: string,
    readonly sideToMove: Side,
    readonly halfmoveClock: number,
    readonly fullmoveNumber: number,
  ) {
    Object.freeze(this);
  }

  /**
   * Parse and validate a FEN string.
   * Throws InvalidPositionError for anything chess.js refuses to load
   * or a board without exactly one king per side.
   */
  static fromFen(fen: string): Position {
    const trimmed = fen.trim();
    let chess: Chess;

    try {
      chess = new Chess(trimmed);
    } catch (error) {
      throw new InvalidPositionError(
        `Invalid FEN: ${error instanceof Error ? error.message : String(error)}`,
        trimmed,
      );
    }

    let whiteKings = 0;
    let blackKings = 0;
    let idleKing: Square | null = null;
    for (const row of chess.board()) {
      for (const piece of row) {
        if (piece?.type !== 'k') continue;
        if (piece.color === 'w') whiteKings++;
        else blackKings++;
        if (piece.color !== chess.turn()) idleKing = piece.square;
      }
    }
    if (whiteKings !== 1 || blackKings !== 1) {
      throw new InvalidPositionError(
        `Invalid FEN: expected one king per side, found ${whiteKings} white and ${blackKings} black`,
        trimmed,
      );
    }

    // The side that just moved cannot have left its king in check
    if (idleKing && chess.isAttacked(idleKing, chess.turn())) {
      throw new InvalidPositionError(
        `Invalid FEN: the side not to move is in check on ${idleKing}`,
        trimmed,
      );
    }

    const normalized = chess.fen();
    const fields = normalized.split(' ');

    return new Position(
      normalized,
      chess.turn(),
      parseInt(fields[4] ?? '0', 10),
      chess.moveNumber(),
    );
  }

  static start(): Position {
    return Position.fromFen(START_FEN);
  }
}
