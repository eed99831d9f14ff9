import { Router } from 'express';
import { z } from 'zod';
import type { GameService } from '../services/gameService';
import { playerOut } from './presenters';

const createPlayerSchema = z.object({
  name: z.string().min(1).max(100),
});

export function createPlayersRouter(games: GameService) {
  const router = Router();

  router.post('/players', async (req, res, next) => {
    try {
      const body = createPlayerSchema.parse(req.body);
      const player = await games.createPlayer(body.name);
      res.status(201).json(playerOut(player));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
