import { Router } from 'express';
import type { SessionStore } from '../services/sessionStore';

export function createHealthRouter(sessions: SessionStore) {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: 'grid-duel', sessions: sessions.size });
  });

  return router;
}
