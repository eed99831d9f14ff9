import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import { SqlClient, SqlPool, isUniqueViolation } from '../lib/db';
import { GameError, StaleGameError } from '../lib/errors';
import { createEmptyBoard } from '../services/rulesEngine';
import { Board, Game, GameRecord, Move, Player } from '../types/game';
import {
  GameRepository,
  NamedGameInput,
  NewGameInput,
  boardBeforeMove,
  clampRecentLimit,
} from './gameRepository';

const mark = z.enum(['X', 'O']);

const playerRow = z.object({
  id: z.string(),
  name: z.string(),
  created_at: z.coerce.date(),
});

const gameRow = z.object({
  id: z.string(),
  board: z.string(),
  next_player: mark,
  status: z.enum(['in_progress', 'won', 'draw']),
  winner: mark.nullable(),
  player_x_id: z.string().nullable(),
  player_o_id: z.string().nullable(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});

const moveRow = z.object({
  id: z.string(),
  game_id: z.string(),
  player_symbol: mark,
  position: z.coerce.number().int(),
  move_number: z.coerce.number().int(),
  created_at: z.coerce.date(),
});

const idRow = z.object({ id: z.string() });

const GAME_COLUMNS = `id, board, next_player, status, winner, player_x_id, player_o_id, created_at, updated_at`;
const MOVE_COLUMNS = `id, game_id, player_symbol, position, move_number, created_at`;

// Stored as char(9) with ' ' for an empty cell.
export function encodeBoard(board: Board): string {
  return board.map((c) => c ?? ' ').join('');
}

export function decodeBoard(raw: string): Board {
  return raw
    .padEnd(9, ' ')
    .slice(0, 9)
    .split('')
    .map((ch) => (ch === 'X' || ch === 'O' ? ch : null));
}

export function toPlayer(row: unknown): Player {
  const r = playerRow.parse(row);
  return { id: r.id, name: r.name, createdAt: r.created_at };
}

export function toGame(row: unknown): Game {
  const r = gameRow.parse(row);
  return {
    id: r.id,
    board: decodeBoard(r.board),
    nextPlayer: r.next_player,
    status: r.status,
    winner: r.winner,
    playerXId: r.player_x_id,
    playerOId: r.player_o_id,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

export function toMove(row: unknown): Move {
  const r = moveRow.parse(row);
  return {
    id: r.id,
    gameId: r.game_id,
    playerSymbol: r.player_symbol,
    position: r.position,
    moveNumber: r.move_number,
    createdAt: r.created_at,
  };
}

export class PgGameRepository implements GameRepository {
  constructor(private readonly db: SqlPool) {}

  async findPlayerByName(name: string): Promise<Player | null> {
    const { rows } = await this.db.query(
      `select id, name, created_at from players where name = $1 limit 1`,
      [name]
    );
    return rows.length > 0 ? toPlayer(rows[0]) : null;
  }

  async createPlayer(name: string): Promise<Player> {
    try {
      const { rows } = await this.db.query(
        `insert into players (id, name) values ($1, $2) returning id, name, created_at`,
        [uuid(), name]
      );
      return toPlayer(rows[0]);
    } catch (err) {
      if (isUniqueViolation(err)) throw new GameError('DuplicateName');
      throw err;
    }
  }

  async createGame(input: NewGameInput = {}): Promise<GameRecord> {
    const game = await insertGame(this.db, input);
    const [record] = await this.hydrate([game]);
    return record;
  }

  async createGameWithPlayers(input: NamedGameInput = {}): Promise<GameRecord> {
    const client = await this.db.connect();
    let open = false;
    let game: Game;
    try {
      await client.query('begin');
      open = true;
      const playerXId = await findOrInsertPlayer(client, input.playerXName);
      const playerOId = await findOrInsertPlayer(client, input.playerOName);
      game = await insertGame(client, { playerXId, playerOId });
      await client.query('commit');
      open = false;
    } catch (err) {
      if (open) await rollback(client);
      throw err;
    } finally {
      client.release();
    }
    const [record] = await this.hydrate([game]);
    return record;
  }

  async getGame(id: string): Promise<GameRecord | null> {
    const { rows } = await this.db.query(`select ${GAME_COLUMNS} from games where id = $1`, [id]);
    if (rows.length === 0) return null;
    const [record] = await this.hydrate([toGame(rows[0])]);
    return record;
  }

  async listRecentGames(limit?: number): Promise<GameRecord[]> {
    const { rows } = await this.db.query(
      `select ${GAME_COLUMNS} from games order by created_at desc, id desc limit $1`,
      [clampRecentLimit(limit)]
    );
    return this.hydrate(rows.map(toGame));
  }

  async saveGameTransition(game: Game, move: Move): Promise<void> {
    const client = await this.db.connect();
    let open = false;
    try {
      await client.query('begin');
      open = true;
      // Compare-and-swap against the pre-move state; a concurrent writer that
      // committed first leaves zero matching rows.
      const updated = await client.query(
        `update games
            set board = $2, next_player = $3, status = $4, winner = $5, updated_at = $6
          where id = $1 and status = 'in_progress' and next_player = $7 and board = $8`,
        [
          game.id,
          encodeBoard(game.board),
          game.nextPlayer,
          game.status,
          game.winner,
          game.updatedAt,
          move.playerSymbol,
          encodeBoard(boardBeforeMove(game, move)),
        ]
      );
      if (updated.rowCount !== 1) {
        throw new StaleGameError(game.id);
      }
      await client.query(
        `insert into moves (${MOVE_COLUMNS}) values ($1, $2, $3, $4, $5, $6)`,
        [move.id, game.id, move.playerSymbol, move.position, move.moveNumber, move.createdAt]
      );
      await client.query('commit');
      open = false;
    } catch (err) {
      if (open) await rollback(client);
      if (isUniqueViolation(err)) throw new StaleGameError(game.id);
      throw err;
    } finally {
      client.release();
    }
  }

  private async hydrate(games: Game[]): Promise<GameRecord[]> {
    if (games.length === 0) return [];
    const gameIds = games.map((g) => g.id);
    const playerIds = new Set<string>();
    for (const g of games) {
      if (g.playerXId) playerIds.add(g.playerXId);
      if (g.playerOId) playerIds.add(g.playerOId);
    }

    const movesRes = await this.db.query(
      `select ${MOVE_COLUMNS} from moves where game_id = any($1::text[]) order by game_id, move_number`,
      [gameIds]
    );
    const movesByGame = new Map<string, Move[]>();
    for (const m of movesRes.rows.map(toMove)) {
      const list = movesByGame.get(m.gameId) ?? [];
      list.push(m);
      movesByGame.set(m.gameId, list);
    }

    const players = new Map<string, Player>();
    if (playerIds.size > 0) {
      const playersRes = await this.db.query(
        `select id, name, created_at from players where id = any($1::text[])`,
        [Array.from(playerIds)]
      );
      for (const p of playersRes.rows.map(toPlayer)) players.set(p.id, p);
    }

    return games.map((g) => ({
      ...g,
      moves: movesByGame.get(g.id) ?? [],
      playerX: g.playerXId ? players.get(g.playerXId) ?? null : null,
      playerO: g.playerOId ? players.get(g.playerOId) ?? null : null,
    }));
  }
}

async function insertGame(db: SqlClient, input: NewGameInput): Promise<Game> {
  const { rows } = await db.query(
    `insert into games (id, board, next_player, status, winner, player_x_id, player_o_id)
     values ($1, $2, 'X', 'in_progress', null, $3, $4)
     returning ${GAME_COLUMNS}`,
    [uuid(), encodeBoard(createEmptyBoard()), input.playerXId ?? null, input.playerOId ?? null]
  );
  return toGame(rows[0]);
}

// A name inserted concurrently by another transaction is picked up by the select.
async function findOrInsertPlayer(db: SqlClient, name: string | null | undefined): Promise<string | null> {
  if (!name) return null;
  const inserted = await db.query(
    `insert into players (id, name) values ($1, $2) on conflict (name) do nothing returning id`,
    [uuid(), name]
  );
  if (inserted.rows.length > 0) return idRow.parse(inserted.rows[0]).id;
  const { rows } = await db.query(`select id from players where name = $1`, [name]);
  return idRow.parse(rows[0]).id;
}

async function rollback(client: SqlClient) {
  try {
    await client.query('rollback');
  } catch (err) {
    console.error('[db] rollback failed', err);
  }
}
