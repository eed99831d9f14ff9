import http from 'http';
import { env } from './config/env';
import { createApp } from './app';
import { closeDb, ensureDb, toSqlPool } from './lib/db';
import { ensureSchema } from './lib/schema';
import { GameRepository } from './repositories/gameRepository';
import { MemoryGameRepository } from './repositories/memoryGameRepository';
import { PgGameRepository } from './repositories/pgGameRepository';
import { createGameService } from './services/gameService';

async function createRepository(): Promise<GameRepository> {
  if (env.storage === 'memory') {
    console.warn('[server] STORAGE=memory, games are lost on restart');
    return new MemoryGameRepository();
  }
  const db = await ensureDb();
  await ensureSchema(db);
  console.log('[schema] ready');
  return new PgGameRepository(toSqlPool(db));
}

async function start() {
  const repo = await createRepository();
  const app = createApp({ games: createGameService(repo), corsOrigin: env.corsOrigin });
  const server = http.createServer(app);

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, shutting down`);
    server.close(() => {
      closeDb()
        .then(() => process.exit(0))
        .catch((err) => {
          console.error('[db] close failed', err);
          process.exit(1);
        });
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  server.listen(env.port, () => {
    console.log(`[server] listening on http://localhost:${env.port}`);
  });
}

start().catch((err) => {
  console.error('[server] failed to start', err);
  process.exit(1);
});
