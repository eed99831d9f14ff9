import type { Pool } from 'pg';

export async function ensureSchema(db: Pool) {
  await db.query(`
    create table if not exists players (
      id text primary key,
      name varchar(100) not null unique,
      created_at timestamptz not null default now()
    );

    create table if not exists games (
      id text primary key,
      board char(9) not null default '         ',
      next_player char(1) not null default 'X' check (next_player in ('X', 'O')),
      status varchar(20) not null default 'in_progress'
        check (status in ('in_progress', 'won', 'draw')),
      winner char(1) check (winner in ('X', 'O')),
      player_x_id text references players(id),
      player_o_id text references players(id),
      created_at timestamptz not null default now(),
      updated_at timestamptz not null default now(),
      constraint ck_games_winner_iff_won check ((status = 'won') = (winner is not null))
    );

    create index if not exists idx_games_created_at on games(created_at desc);

    create table if not exists moves (
      id text primary key,
      game_id text not null references games(id) on delete cascade,
      player_symbol char(1) not null check (player_symbol in ('X', 'O')),
      position integer not null check (position between 0 and 8),
      move_number integer not null check (move_number >= 1),
      created_at timestamptz not null default now(),
      constraint uq_game_position unique (game_id, position),
      constraint uq_game_move_number unique (game_id, move_number)
    );

    create index if not exists idx_moves_game_id on moves(game_id);
  `);
}
