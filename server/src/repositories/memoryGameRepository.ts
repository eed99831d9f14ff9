import { v4 as uuid } from 'uuid';
import { Game, GameRecord, Move, Player } from '../types/game';
import { GameError, StaleGameError } from '../lib/errors';
import { createEmptyBoard } from '../services/rulesEngine';
import {
  GameRepository,
  NamedGameInput,
  NewGameInput,
  boardBeforeMove,
  clampRecentLimit,
} from './gameRepository';

function copyPlayer(p: Player): Player {
  return { ...p, createdAt: new Date(p.createdAt) };
}

function copyGame(g: Game): Game {
  return {
    ...g,
    board: g.board.slice(),
    createdAt: new Date(g.createdAt),
    updatedAt: new Date(g.updatedAt),
  };
}

function copyMove(m: Move): Move {
  return { ...m, createdAt: new Date(m.createdAt) };
}

function sameBoard(a: Game['board'], b: Game['board']): boolean {
  return a.length === b.length && a.every((cell, i) => cell === b[i]);
}

/**
 * In-process store. Every operation runs to completion without awaiting, so
 * a transition is applied atomically with respect to other requests.
 */
export class MemoryGameRepository implements GameRepository {
  private players = new Map<string, Player>(); // key by id
  private playerIdByName = new Map<string, string>();
  private games = new Map<string, Game>();
  private moves = new Map<string, Move[]>(); // gameId -> moves by moveNumber
  private gameOrder: string[] = []; // insertion order, oldest first

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async findPlayerByName(name: string): Promise<Player | null> {
    const id = this.playerIdByName.get(name);
    const player = id ? this.players.get(id) : undefined;
    return player ? copyPlayer(player) : null;
  }

  async createPlayer(name: string): Promise<Player> {
    if (this.playerIdByName.has(name)) throw new GameError('DuplicateName');
    const player: Player = { id: uuid(), name, createdAt: this.clock() };
    this.players.set(player.id, player);
    this.playerIdByName.set(name, player.id);
    return copyPlayer(player);
  }

  async createGame(input: NewGameInput = {}): Promise<GameRecord> {
    for (const id of [input.playerXId, input.playerOId]) {
      if (id && !this.players.has(id)) throw GameError.notFound('Player');
    }
    return this.insertGame(input);
  }

  // Nothing here awaits or throws after the first write, so it is all or nothing.
  async createGameWithPlayers(input: NamedGameInput = {}): Promise<GameRecord> {
    const playerXId = this.findOrInsertPlayer(input.playerXName);
    const playerOId = this.findOrInsertPlayer(input.playerOName);
    return this.insertGame({ playerXId, playerOId });
  }

  private findOrInsertPlayer(name: string | null | undefined): string | null {
    if (!name) return null;
    const existing = this.playerIdByName.get(name);
    if (existing) return existing;
    const player: Player = { id: uuid(), name, createdAt: this.clock() };
    this.players.set(player.id, player);
    this.playerIdByName.set(name, player.id);
    return player.id;
  }

  private insertGame(input: NewGameInput): GameRecord {
    const now = this.clock();
    const game: Game = {
      id: uuid(),
      board: createEmptyBoard(),
      nextPlayer: 'X',
      status: 'in_progress',
      winner: null,
      playerXId: input.playerXId ?? null,
      playerOId: input.playerOId ?? null,
      createdAt: now,
      updatedAt: now,
    };
    this.games.set(game.id, game);
    this.moves.set(game.id, []);
    this.gameOrder.push(game.id);
    return this.toRecord(game);
  }

  async getGame(id: string): Promise<GameRecord | null> {
    const game = this.games.get(id);
    return game ? this.toRecord(game) : null;
  }

  async listRecentGames(limit?: number): Promise<GameRecord[]> {
    const n = clampRecentLimit(limit);
    const ids = this.gameOrder.slice();
    // Stable sort keeps later inserts first among equal timestamps.
    ids.reverse();
    const games = ids
      .map((id) => this.games.get(id))
      .filter((g): g is Game => g !== undefined)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    return games.slice(0, n).map((g) => this.toRecord(g));
  }

  async saveGameTransition(game: Game, move: Move): Promise<void> {
    const stored = this.games.get(game.id);
    const history = this.moves.get(game.id);
    if (!stored || !history) throw GameError.notFound('Game');

    const expectedNumber = history.length + 1;
    const fresh =
      stored.status === 'in_progress' &&
      stored.nextPlayer === move.playerSymbol &&
      sameBoard(stored.board, boardBeforeMove(game, move)) &&
      move.gameId === game.id &&
      move.moveNumber === expectedNumber &&
      !history.some((m) => m.position === move.position);
    if (!fresh) throw new StaleGameError(game.id);

    this.games.set(game.id, copyGame(game));
    history.push(copyMove(move));
  }

  private toRecord(game: Game): GameRecord {
    const playerX = game.playerXId ? this.players.get(game.playerXId) : undefined;
    const playerO = game.playerOId ? this.players.get(game.playerOId) : undefined;
    return {
      ...copyGame(game),
      moves: (this.moves.get(game.id) ?? []).map(copyMove),
      playerX: playerX ? copyPlayer(playerX) : null,
      playerO: playerO ? copyPlayer(playerO) : null,
    };
  }
}
