import { describe, it, expect } from 'vitest';

import { Position, START_FEN } from '../Position.js';
import { rulesOracle } from '../RulesOracle.js';
import { IllegalMoveError, InvalidPositionError } from '../../utils/errors.js';
import { FENS } from '../../__tests__/fixtures.js';

describe('Position', () => {
  it('should parse the starting position', () => {
    const position = Position.start();
    expect(position.fen).toBe(START_FEN);
    expect(position.sideToMove).toBe('w');
    expect(position.halfmoveClock).toBe(0);
    expect(position.fullmoveNumber).toBe(1);
  });

  it('should read move counters from the FEN', () => {
    const position = Position.fromFen(FENS.fiftyMoves);
    expect(position.halfmoveClock).toBe(100);
    expect(position.fullmoveNumber).toBe(80);
  });

  it('should trim surrounding whitespace', () => {
    expect(Position.fromFen(`  ${START_FEN}  `).fen).toBe(START_FEN);
  });

  it('should reject malformed FEN', () => {
    expect(() => Position.fromFen('not a fen')).toThrow(InvalidPositionError);
    expect(() => Position.fromFen('')).toThrow(InvalidPositionError);
  });

  it('should reject a board without a black king', () => {
    expect(() => Position.fromFen('8/8/8/8/8/8/8/4K3 w - - 0 1')).toThrow(InvalidPositionError);
  });

  it('should reject a position where the side not to move is in check', () => {
    expect(() => Position.fromFen('4k3/8/8/8/8/8/8/4R1K1 w - - 0 1')).toThrow(InvalidPositionError);
  });

  it('should accept the side to move being in check', () => {
    expect(Position.fromFen('4k3/8/8/8/8/8/8/4R1K1 b - - 0 1').sideToMove).toBe('b');
  });

  it('should be immutable', () => {
    expect(Object.isFrozen(Position.start())).toBe(true);
  });
});

describe('ChessJsRulesOracle', () => {
  const start = Position.start();

  it('should list twenty legal moves from the start', () => {
    const moves = rulesOracle.legalMoves(start);
    expect(moves).toHaveLength(20);
    expect(moves.map((m) => m.uci)).toContain('e2e4');
    expect(moves.map((m) => m.uci)).toContain('g1f3');
  });

  it('should parse UCI and SAN notation', () => {
    expect(rulesOracle.parseMove(start, 'e2e4').san).toBe('e4');
    expect(rulesOracle.parseMove(start, 'Nf3').uci).toBe('g1f3');
    expect(rulesOracle.parseMove(start, 'E2E4').uci).toBe('e2e4');
  });

  it('should parse promotions', () => {
    const position = Position.fromFen('8/4P3/8/8/8/8/k7/4K3 w - - 0 1');
    const move = rulesOracle.parseMove(position, 'e7e8q');
    expect(move.promotion).toBe('q');
    expect(move.uci).toBe('e7e8q');
  });

  it('should reject illegal moves', () => {
    expect(() => rulesOracle.parseMove(start, 'e2e5')).toThrow(IllegalMoveError);
    expect(() => rulesOracle.parseMove(start, 'Qh5')).toThrow(IllegalMoveError);
  });

  it('should apply a move without touching the original position', () => {
    const after = rulesOracle.apply(start, rulesOracle.parseMove(start, 'e2e4'));
    expect(after.sideToMove).toBe('b');
    expect(after.fen.split(' ')[0]).toBe('rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR');
    expect(start.fen).toBe(START_FEN);
  });

  it('should render positions and moves', () => {
    expect(rulesOracle.toFen(start)).toBe(START_FEN);
    expect(rulesOracle.moveToNotation(rulesOracle.parseMove(start, 'Nc3'))).toBe('b1c3');
  });

  it('should count moves for the side not to move', () => {
    expect(rulesOracle.countMoves(start, 'w')).toBe(20);
    expect(rulesOracle.countMoves(start, 'b')).toBe(20);
  });

  it('should detect attacked squares', () => {
    const position = Position.fromFen(FENS.check);
    expect(rulesOracle.isAttacked(position, 'e8', 'w')).toBe(true);
    expect(rulesOracle.isAttacked(position, 'd8', 'w')).toBe(false);
  });

  it('should expose the board with rank 8 first', () => {
    const grid = rulesOracle.board(start);
    expect(grid[0][4]).toMatchObject({ type: 'k', color: 'b', square: 'e8' });
    expect(grid[7][4]).toMatchObject({ type: 'k', color: 'w', square: 'e1' });
    expect(grid[4][4]).toBeNull();
  });
});
