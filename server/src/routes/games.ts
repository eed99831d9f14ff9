import { Router } from 'express';
import { z } from 'zod';
import type { GameService } from '../services/gameService';
import { MAX_RECENT_GAMES } from '../repositories/gameRepository';
import { gameOut } from './presenters';

// An empty name means no player for that side.
const createGameSchema = z.object({
  player_x_name: z.string().max(100).nullish(),
  player_o_name: z.string().max(100).nullish(),
});

// Range is left to the rules engine so 9 reports OutOfRange.
const submitMoveSchema = z.object({
  position: z.number().int(),
  player: z.enum(['X', 'O']),
});

const listQuerySchema = z.object({
  limit: z.coerce.number().int().optional(),
});

export function createGamesRouter(games: GameService) {
  const router = Router();

  router.post('/games', async (req, res, next) => {
    try {
      const body = createGameSchema.parse(req.body ?? {});
      const game = await games.startGame({
        playerXName: body.player_x_name,
        playerOName: body.player_o_name,
      });
      res.status(201).json(gameOut(game));
    } catch (err) {
      next(err);
    }
  });

  router.get('/games', async (req, res, next) => {
    try {
      const query = listQuerySchema.parse(req.query);
      const items = await games.listRecentGames(query.limit ?? MAX_RECENT_GAMES);
      res.json({ items: items.map(gameOut) });
    } catch (err) {
      next(err);
    }
  });

  router.get('/games/:id', async (req, res, next) => {
    try {
      const game = await games.getGame(req.params.id);
      res.json(gameOut(game));
    } catch (err) {
      next(err);
    }
  });

  router.post('/games/:id/moves', async (req, res, next) => {
    try {
      const body = submitMoveSchema.parse(req.body);
      const game = await games.submitMove(req.params.id, body.player, body.position);
      res.json(gameOut(game));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
