import { Request, Response, NextFunction } from 'express';
import { bearerToken, verifyToken } from '../lib/jwt';

declare module 'express-serve-static-core' {
  interface Request {
    user?: { id: string; username: string };
  }
}

export function requireAuth(req: Request, res: Response, next: NextFunction) {
  const token = bearerToken(req.headers['authorization']);
  if (!token) {
    return res.status(401).json({ error: 'unauthorized' });
  }
  const payload = verifyToken(token);
  if (!payload) return res.status(401).json({ error: 'unauthorized' });
  req.user = { id: payload.id, username: payload.username };
  return next();
}
