import express from 'express';
import cors from 'cors';
import healthRouter from './routes/health';
import { createPlayersRouter } from './routes/players';
import { createGamesRouter } from './routes/games';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import type { GameService } from './services/gameService';

export interface AppOptions {
  games: GameService;
  corsOrigin?: string;
}

export function createApp({ games, corsOrigin = '*' }: AppOptions) {
  const app = express();

  app.use(cors({ origin: corsOrigin }));
  app.use(express.json());

  app.use('/', healthRouter);
  app.use('/', createPlayersRouter(games));
  app.use('/', createGamesRouter(games));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
