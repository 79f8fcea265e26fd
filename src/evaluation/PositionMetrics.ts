/**
 * Position Metrics
 * Raw per-side measurements shared by the feature extractor and the
 * heuristic evaluator, so a position is walked once per evaluation.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { SQUARES } from 'chess.js';
import type { PieceSymbol } from 'chess.js';
import { z } from 'zod';
import {
  CENTER_SQUARES,
  ENDGAME_PIECE_COUNT,
  PIECE_VALUES,
  POSITIONAL_TERMS,
} from '../config/constants.js';
import type { Position } from '../engine/Position.js';
import type { BoardGrid, BoardPiece, RulesOracle } from '../engine/RulesOracle.js';
import type { Side } from '../types/index.js';

const tableSchema = z.array(z.array(z.number()).length(8)).length(8);

const pieceSquareFileSchema = z.object({
  tables: z.object({
    p: tableSchema,
    n: tableSchema,
    b: tableSchema,
    r: tableSchema,
    q: tableSchema,
    k_middlegame: tableSchema,
    k_endgame: tableSchema,
  }),
});

const CENTER: ReadonlySet<string> = new Set(CENTER_SQUARES);

type PieceSquareTables = z.infer<typeof pieceSquareFileSchema>['tables'];

const PIECE_SQUARE_TABLES: PieceSquareTables = pieceSquareFileSchema.parse(
  JSON.parse(
    readFileSync(fileURLToPath(new URL('../../data/piece-square-tables.json', import.meta.url)), 'utf8'),
  ),
).tables;

export interface PawnStructure {
  readonly doubled: number;
  readonly isolated: number;
  readonly passed: number;
}

export interface SideMetrics {
  /** Sum of piece values, pawn units */
  readonly material: number;
  /** Sum of piece-square bonuses, pawn units */
  readonly pieceSquare: number;
  /** Legal move count */
  readonly mobility: number;
  readonly kingShield: number;
  readonly kingZoneAttacked: number;
  readonly kingSafety: number;
  readonly pawns: PawnStructure;
  readonly pawnStructure: number;
  /** Own pieces standing on d4, e4, d5, e5 */
  readonly center: number;
}

export interface PositionMetrics {
  readonly white: SideMetrics;
  readonly black: SideMetrics;
  readonly pieceCount: number;
  readonly isEndgame: boolean;
  readonly sideToMove: Side;
}

interface PlacedPiece extends BoardPiece {
  readonly row: number;
  readonly col: number;
}

/**
 * Walk the board once and measure both sides
 */
export function measurePosition(position: Position, oracle: RulesOracle): PositionMetrics {
  const pieces = collectPieces(oracle.board(position));
  const isEndgame = pieces.length <= ENDGAME_PIECE_COUNT;

  return {
    white: measureSide(position, oracle, pieces, 'w', isEndgame),
    black: measureSide(position, oracle, pieces, 'b', isEndgame),
    pieceCount: pieces.length,
    isEndgame,
    sideToMove: position.sideToMove,
  };
}

function collectPieces(grid: BoardGrid): PlacedPiece[] {
  const pieces: PlacedPiece[] = [];
  grid.forEach((row, rowIndex) => {
    row.forEach((piece, colIndex) => {
      if (piece) pieces.push({ ...piece, row: rowIndex, col: colIndex });
    });
  });
  return pieces;
}

function measureSide(
  position: Position,
  oracle: RulesOracle,
  pieces: readonly PlacedPiece[],
  side: Side,
  isEndgame: boolean,
): SideMetrics {
  const own = pieces.filter((p) => p.color === side);
  const enemy: Side = side === 'w' ? 'b' : 'w';

  let material = 0;
  let pieceSquare = 0;
  let center = 0;

  for (const piece of own) {
    material += PIECE_VALUES[piece.type];
    // Black reads the tables mirrored top to bottom
    const row = side === 'w' ? piece.row : 7 - piece.row;
    pieceSquare += tableFor(piece.type, isEndgame)[row][piece.col] / 100;
    if (CENTER.has(piece.square)) center++;
  }

  const { shield, attacked } = measureKing(position, oracle, pieces, side, enemy);
  const kingSafety =
    shield * POSITIONAL_TERMS.KING_SHIELD_PAWN - attacked * POSITIONAL_TERMS.KING_ZONE_ATTACKED;

  const pawns = measurePawns(pieces, side);
  const pawnStructure =
    pawns.passed * POSITIONAL_TERMS.PASSED_PAWN -
    pawns.doubled * POSITIONAL_TERMS.DOUBLED_PAWN -
    pawns.isolated * POSITIONAL_TERMS.ISOLATED_PAWN;

  return {
    material,
    pieceSquare,
    mobility: oracle.countMoves(position, side),
    kingShield: shield,
    kingZoneAttacked: attacked,
    kingSafety,
    pawns,
    pawnStructure,
    center,
  };
}

function tableFor(type: PieceSymbol, isEndgame: boolean): number[][] {
  if (type === 'k') {
    return isEndgame ? PIECE_SQUARE_TABLES.k_endgame : PIECE_SQUARE_TABLES.k_middlegame;
  }
  return PIECE_SQUARE_TABLES[type];
}

/**
 * Pawn shield in front of the king and enemy-attacked squares around it
 */
function measureKing(
  position: Position,
  oracle: RulesOracle,
  pieces: readonly PlacedPiece[],
  side: Side,
  enemy: Side,
): { shield: number; attacked: number } {
  const king = pieces.find((p) => p.type === 'k' && p.color === side);
  if (!king) return { shield: 0, attacked: 0 };

  // "Forward" is towards row 0 for White
  const forward = side === 'w' ? -1 : 1;
  const shieldRow = king.row + forward;
  let shield = 0;
  let attacked = 0;

  for (let dc = -1; dc <= 1; dc++) {
    const col = king.col + dc;
    if (col < 0 || col > 7 || shieldRow < 0 || shieldRow > 7) continue;
    const isShieldPawn = pieces.some(
      (p) => p.type === 'p' && p.color === side && p.row === shieldRow && p.col === col,
    );
    if (isShieldPawn) shield++;
  }

  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0) continue;
      const row = king.row + dr;
      const col = king.col + dc;
      if (row < 0 || row > 7 || col < 0 || col > 7) continue;
      if (oracle.isAttacked(position, SQUARES[row * 8 + col], enemy)) attacked++;
    }
  }

  return { shield, attacked };
}

function measurePawns(pieces: readonly PlacedPiece[], side: Side): PawnStructure {
  const own = pieces.filter((p) => p.type === 'p' && p.color === side);
  const enemy = pieces.filter((p) => p.type === 'p' && p.color !== side);

  const perFile = new Array<number>(8).fill(0);
  for (const pawn of own) perFile[pawn.col]++;

  let doubled = 0;
  for (const count of perFile) {
    if (count > 1) doubled += count - 1;
  }

  let isolated = 0;
  let passed = 0;
  for (const pawn of own) {
    const left = pawn.col > 0 ? perFile[pawn.col - 1] : 0;
    const right = pawn.col < 7 ? perFile[pawn.col + 1] : 0;
    if (left === 0 && right === 0) isolated++;

    // White pawns advance towards row 0
    const blocked = enemy.some(
      (e) => Math.abs(e.col - pawn.col) <= 1 && (side === 'w' ? e.row < pawn.row : e.row > pawn.row),
    );
    if (!blocked) passed++;
  }

  return { doubled, isolated, passed };
}
