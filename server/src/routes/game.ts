import { Router, type Response } from 'express';
import { ZodError } from 'zod';
import { requireAuth } from '../middleware/auth';
import { moveSchema, newGameSchema } from '../lib/payloads';
import type { GameErrorCode, GameService } from '../services/gameService';

function sendFailure(res: Response, err: unknown, fallback: string) {
  if (err instanceof ZodError) return res.status(400).json({ error: 'invalid_input', details: err.issues });
  console.error(`[game] ${fallback}`, err);
  return res.status(500).json({ error: fallback });
}

function sendRejected(res: Response, error: GameErrorCode) {
  return res.status(409).json({ error });
}

export function createGameRouter(games: GameService) {
  const router = Router();
  router.use('/game', requireAuth);

  router.get('/game', (req, res) => {
    if (!req.user) return res.status(401).json({ error: 'unauthorized' });
    res.json(games.getView(req.user.id));
  });

  router.post('/game/new', (req, res) => {
    try {
      if (!req.user) return res.status(401).json({ error: 'unauthorized' });
      const body = newGameSchema.parse(req.body);
      res.json(games.startNewGame(req.user.id, body.mode));
    } catch (err) {
      sendFailure(res, err, 'new_game_failed');
    }
  });

  router.post('/game/move', (req, res) => {
    try {
      if (!req.user) return res.status(401).json({ error: 'unauthorized' });
      const body = moveSchema.parse(req.body);
      const result = games.playTurn(req.user.id, body.row, body.col);
      if (!result.ok) return sendRejected(res, result.error);
      res.json({ human: result.human, opponent: result.opponent, view: result.view });
    } catch (err) {
      sendFailure(res, err, 'move_failed');
    }
  });

  router.post('/game/sides', (req, res) => {
    if (!req.user) return res.status(401).json({ error: 'unauthorized' });
    const result = games.reassignSides(req.user.id);
    if (!result.ok) return sendRejected(res, result.error);
    res.json(result.view);
  });

  router.post('/game/reset', (req, res) => {
    if (!req.user) return res.status(401).json({ error: 'unauthorized' });
    res.json(games.resetGame(req.user.id));
  });

  return router;
}
