import { Board, PlayerMark } from '../types/game';
import { GameError } from '../lib/errors';

export const BOARD_SIZE = 9;

export const WIN_LINES: ReadonlyArray<readonly [number, number, number]> = [
  [0, 1, 2],
  [3, 4, 5],
  [6, 7, 8],
  [0, 3, 6],
  [1, 4, 7],
  [2, 5, 8],
  [0, 4, 8],
  [2, 4, 6],
];

export function createEmptyBoard(): Board {
  return Array<Board[number]>(BOARD_SIZE).fill(null);
}

// Lines are scanned in WIN_LINES order; the first complete one wins.
export function checkWinner(board: Board): PlayerMark | null {
  for (const [a, b, c] of WIN_LINES) {
    const mark = board[a];
    if (mark && mark === board[b] && mark === board[c]) {
      return mark;
    }
  }
  return null;
}

export function isFull(board: Board): boolean {
  return board.every((c) => c !== null);
}

export function isDraw(board: Board): boolean {
  return isFull(board) && checkWinner(board) === null;
}

/** Throws OutOfRange or CellOccupied; never touches the board. */
export function validateMove(board: Board, position: number): void {
  if (!Number.isInteger(position) || position < 0 || position >= BOARD_SIZE) {
    throw new GameError('OutOfRange');
  }
  if (board[position] !== null) {
    throw new GameError('CellOccupied');
  }
}

export function otherMark(mark: PlayerMark): PlayerMark {
  return mark === 'X' ? 'O' : 'X';
}
