export type PlayerMark = 'X' | 'O';

export type Cell = PlayerMark | null;

export type Board = Cell[]; // 9 cells, row-major

export type GameStatus = 'in_progress' | 'won' | 'draw';

export interface Player {
  id: string;
  name: string;
  createdAt: Date;
}

export interface Game {
  id: string;
  board: Board;
  nextPlayer: PlayerMark;
  status: GameStatus;
  winner: PlayerMark | null; // set only when status is 'won'
  playerXId: string | null;
  playerOId: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface Move {
  id: string;
  gameId: string;
  position: number; // 0..8
  playerSymbol: PlayerMark;
  moveNumber: number; // 1..N per game
  createdAt: Date;
}

/** A game with its move history (ordered by moveNumber) and resolved players. */
export interface GameRecord extends Game {
  moves: Move[];
  playerX: Player | null;
  playerO: Player | null;
}
