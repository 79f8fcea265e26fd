/**
 * Rules oracle - legal move generation and terminal-state detection.
 * The engine treats it as trusted; chess.js backs the default implementation.
 */

import { Chess } from 'chess.js';
import type { Color, PieceSymbol, Square } from 'chess.js';
import type { Move, Side } from '../types/index.js';
import { IllegalMoveError } from '../utils/errors.js';
import { Position } from './Position.js';

export interface BoardPiece {
  readonly square: Square;
  readonly type: PieceSymbol;
  readonly color: Color;
}

/** 8x8 grid, row 0 is rank 8 and column 0 is the a-file */
export type BoardGrid = ReadonlyArray<ReadonlyArray<BoardPiece | null>>;

export interface RulesOracle {
  legalMoves(position: Position): Move[];
  apply(position: Position, move: Move): Position;
  /** Resolve a UCI ("e2e4") or SAN ("Nf3") move against the legal moves */
  parseMove(position: Position, notation: string): Move;
  /** Legal move count for a side, whether or not it is that side's turn */
  countMoves(position: Position, side: Side): number;
  isCheck(position: Position): boolean;
  isCheckmate(position: Position): boolean;
  isStalemate(position: Position): boolean;
  hasInsufficientMaterial(position: Position): boolean;
  /** Any draw: stalemate, insufficient material, fifty-move rule or repetition */
  isDraw(position: Position): boolean;
  isAttacked(position: Position, square: Square, by: Side): boolean;
  board(position: Position): BoardGrid;
  toFen(position: Position): string;
  moveToNotation(move: Move): string;
}

export class ChessJsRulesOracle implements RulesOracle {
  // Read-only chess.js instances per position; `apply` never mutates these
  private readonly instances = new WeakMap<Position, Chess>();

  legalMoves(position: Position): Move[] {
    return this.instanceFor(position)
      .moves({ verbose: true })
      .map((m) => ({
        from: m.from,
        to: m.to,
        ...(m.promotion ? { promotion: m.promotion } : {}),
        uci: `${m.from}${m.to}${m.promotion ?? ''}`,
        san: m.san,
      }));
  }

  apply(position: Position, move: Move): Position {
    const chess = new Chess(position.fen);
    try {
      chess.move({ from: move.from, to: move.to, promotion: move.promotion });
    } catch {
      throw new IllegalMoveError(move.uci, position.fen);
    }
    return Position.fromFen(chess.fen());
  }

  parseMove(position: Position, notation: string): Move {
    const wanted = notation.trim();
    const lowered = wanted.toLowerCase();
    const moves = this.legalMoves(position);

    const match =
      moves.find((m) => m.uci === lowered) ??
      moves.find((m) => m.san === wanted || m.san.replace(/[+#]$/, '') === wanted);

    if (!match) {
      throw new IllegalMoveError(wanted, position.fen);
    }
    return match;
  }

  countMoves(position: Position, side: Side): number {
    if (side === position.sideToMove) {
      return this.instanceFor(position).moves().length;
    }

    const fields = position.fen.split(' ');
    fields[1] = side;
    fields[3] = '-';
    try {
      return new Chess(fields.join(' ')).moves().length;
    } catch {
      // chess.js refused the turn-flipped board: the idle side gets no mobility credit
      return 0;
    }
  }

  isCheck(position: Position): boolean {
    return this.instanceFor(position).isCheck();
  }

  isCheckmate(position: Position): boolean {
    return this.instanceFor(position).isCheckmate();
  }

  isStalemate(position: Position): boolean {
    return this.instanceFor(position).isStalemate();
  }

  hasInsufficientMaterial(position: Position): boolean {
    return this.instanceFor(position).isInsufficientMaterial();
  }

  isDraw(position: Position): boolean {
    return this.instanceFor(position).isDraw();
  }

  isAttacked(position: Position, square: Square, by: Side): boolean {
    return this.instanceFor(position).isAttacked(square, by);
  }

  board(position: Position): BoardGrid {
    return this.instanceFor(position).board();
  }

  toFen(position: Position): string {
    return position.fen;
  }

  moveToNotation(move: Move): string {
    return move.uci;
  }

  private instanceFor(position: Position): Chess {
    let chess = this.instances.get(position);
    if (!chess) {
      chess = new Chess(position.fen);
      this.instances.set(position, chess);
    }
    return chess;
  }
}

// Singleton instance for global access
export const rulesOracle: RulesOracle = new ChessJsRulesOracle();
