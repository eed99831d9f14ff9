import { Board, Game, GameRecord, Move, Player } from '../types/game';

export const MAX_RECENT_GAMES = 50;

export interface NewGameInput {
  playerXId?: string | null;
  playerOId?: string | null;
}

/** An empty or missing name leaves that side without a player. */
export interface NamedGameInput {
  playerXName?: string | null;
  playerOName?: string | null;
}

/**
 * Storage boundary for players, games and moves. Implementations hand out
 * copies; mutating a returned record never changes what is stored.
 */
export interface GameRepository {
  findPlayerByName(name: string): Promise<Player | null>;
  /** Throws GameError('DuplicateName') when the name is taken. */
  createPlayer(name: string): Promise<Player>;
  createGame(input?: NewGameInput): Promise<GameRecord>;
  /**
   * Finds or creates the named players and creates the game as one unit:
   * when the game cannot be stored, no new player is kept either.
   */
  createGameWithPlayers(input?: NamedGameInput): Promise<GameRecord>;
  getGame(id: string): Promise<GameRecord | null>;
  /** Newest first. */
  listRecentGames(limit?: number): Promise<GameRecord[]>;
  /**
   * Persists the post-move game and its new move as one unit. Throws
   * StaleGameError when the stored game is no longer the pre-move state.
   */
  saveGameTransition(game: Game, move: Move): Promise<void>;
}

/** The board as it was before `move` was written into `game`. */
export function boardBeforeMove(game: Game, move: Move): Board {
  const board = game.board.slice();
  board[move.position] = null;
  return board;
}

export function clampRecentLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return MAX_RECENT_GAMES;
  return Math.max(1, Math.min(MAX_RECENT_GAMES, Math.floor(limit)));
}
