import { v4 as uuid } from 'uuid';
import { Game, GameRecord, Move, Player, PlayerMark } from '../types/game';
import { GameError, StaleGameError } from '../lib/errors';
import { GameRepository, NamedGameInput } from '../repositories/gameRepository';
import { checkWinner, isDraw, otherMark, validateMove } from './rulesEngine';

export interface MoveResult {
  game: Game;
  move: Move;
}

/**
 * Pure transition for one move. Returns new objects and leaves `record`
 * untouched; throws GameFinished, WrongTurn, OutOfRange or CellOccupied.
 *
 * After a win `nextPlayer` keeps the winner's mark rather than flipping.
 */
export function applyMove(
  record: GameRecord,
  mark: PlayerMark,
  position: number,
  now: Date = new Date()
): MoveResult {
  if (record.status !== 'in_progress') throw new GameError('GameFinished');
  if (mark !== record.nextPlayer) throw GameError.wrongTurn(record.nextPlayer);
  validateMove(record.board, position);

  const board = record.board.slice();
  board[position] = mark;

  const last = record.moves[record.moves.length - 1];
  const move: Move = {
    id: uuid(),
    gameId: record.id,
    position,
    playerSymbol: mark,
    moveNumber: last ? last.moveNumber + 1 : 1,
    createdAt: now,
  };

  const game: Game = {
    id: record.id,
    board,
    nextPlayer: record.nextPlayer,
    status: 'in_progress',
    winner: null,
    playerXId: record.playerXId,
    playerOId: record.playerOId,
    createdAt: record.createdAt,
    updatedAt: now,
  };

  const winner = checkWinner(board);
  if (winner) {
    game.status = 'won';
    game.winner = winner;
  } else if (isDraw(board)) {
    game.status = 'draw';
  } else {
    game.nextPlayer = otherMark(mark);
  }

  return { game, move };
}

export type StartGameInput = NamedGameInput;

export interface GameService {
  createPlayer(name: string): Promise<Player>;
  startGame(input?: StartGameInput): Promise<GameRecord>;
  getGame(id: string): Promise<GameRecord>;
  listRecentGames(limit?: number): Promise<GameRecord[]>;
  submitMove(gameId: string, mark: PlayerMark, position: number): Promise<GameRecord>;
}

export function createGameService(repo: GameRepository): GameService {
  async function loadGame(id: string): Promise<GameRecord> {
    const record = await repo.getGame(id);
    if (!record) throw GameError.notFound('Game');
    return record;
  }

  return {
    async createPlayer(name) {
      const existing = await repo.findPlayerByName(name);
      if (existing) throw new GameError('DuplicateName');
      return repo.createPlayer(name);
    },

    startGame(input = {}) {
      return repo.createGameWithPlayers(input);
    },

    getGame: loadGame,

    listRecentGames(limit) {
      return repo.listRecentGames(limit);
    },

    async submitMove(gameId, mark, position) {
      const record = await loadGame(gameId);
      const { game, move } = applyMove(record, mark, position);
      try {
        await repo.saveGameTransition(game, move);
      } catch (err) {
        if (!(err instanceof StaleGameError)) throw err;
        // Lost a race: validate against what is stored now so the caller gets
        // the domain error the winning write caused.
        applyMove(await loadGame(gameId), mark, position);
        throw new GameError('Conflict');
      }
      if (game.status !== 'in_progress') {
        console.log(`[game] ${game.id} finished status=${game.status} winner=${game.winner ?? '-'} moves=${move.moveNumber}`);
      }
      return loadGame(gameId);
    },
  };
}
