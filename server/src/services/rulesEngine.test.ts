import { describe, it, expect } from 'vitest';
import { Board } from '../types/game';
import { GameError } from '../lib/errors';
import { WIN_LINES, checkWinner, createEmptyBoard, isDraw, validateMove } from './rulesEngine';

// 'X', 'O' or '.' per cell, row-major.
function board(layout: string): Board {
  return layout.split('').map((ch) => (ch === 'X' || ch === 'O' ? ch : null));
}

function errorKind(fn: () => void): string | null {
  try {
    fn();
    return null;
  } catch (err) {
    return err instanceof GameError ? err.kind : 'unexpected';
  }
}

describe('rules engine', () => {
  it('starts from nine empty cells', () => {
    expect(createEmptyBoard()).toEqual([null, null, null, null, null, null, null, null, null]);
  });

  it('detects every winning line', () => {
    for (const line of WIN_LINES) {
      const b = createEmptyBoard();
      for (const i of line) b[i] = 'O';
      expect(checkWinner(b)).toBe('O');
    }
  });

  it('returns null when no line is complete', () => {
    expect(checkWinner(createEmptyBoard())).toBeNull();
    expect(checkWinner(board('XX.OO....'))).toBeNull();
  });

  it('ignores lines of empty cells', () => {
    expect(checkWinner(board('...XOX...'))).toBeNull();
  });

  it('reports the first matching line in row, column, diagonal order', () => {
    // Not reachable through play; row 0 is checked before row 2.
    expect(checkWinner(board('XXX...OOO'))).toBe('X');
  });

  it('treats a full board without a line as a draw', () => {
    const b = board('XOXXOOOXX');
    expect(checkWinner(b)).toBeNull();
    expect(isDraw(b)).toBe(true);
  });

  it('does not call a full board with a line a draw', () => {
    const b = board('XXXOOXXOO');
    expect(checkWinner(b)).toBe('X');
    expect(isDraw(b)).toBe(false);
  });

  it('does not call a partial board a draw', () => {
    expect(isDraw(board('XOXXOO.X.'))).toBe(false);
  });

  it('rejects positions outside 0..8', () => {
    const b = createEmptyBoard();
    expect(errorKind(() => validateMove(b, -1))).toBe('OutOfRange');
    expect(errorKind(() => validateMove(b, 9))).toBe('OutOfRange');
    expect(errorKind(() => validateMove(b, 1.5))).toBe('OutOfRange');
  });

  it('rejects occupied cells without touching the board', () => {
    const b = board('....X....');
    expect(errorKind(() => validateMove(b, 4))).toBe('CellOccupied');
    expect(b).toEqual(board('....X....'));
  });

  it('accepts an empty cell and leaves the board as it was', () => {
    const b = board('....X....');
    expect(errorKind(() => validateMove(b, 0))).toBeNull();
    expect(b[0]).toBeNull();
  });
});
