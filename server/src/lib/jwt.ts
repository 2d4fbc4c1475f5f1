import jwt, { type SignOptions } from 'jsonwebtoken';
import { z } from 'zod';
import { env } from '../config/env';

const payloadSchema = z.object({
  id: z.string().min(1),
  username: z.string().min(1),
});

export type AuthTokenPayload = z.infer<typeof payloadSchema>;

export function signToken(
  payload: AuthTokenPayload,
  expiresIn: SignOptions['expiresIn'] = '7d',
  secret: string = env.jwtSecret
) {
  return jwt.sign(payload, secret, { expiresIn });
}

export function verifyToken(token: string, secret: string = env.jwtSecret): AuthTokenPayload | null {
  try {
    const parsed = payloadSchema.safeParse(jwt.verify(token, secret));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export function bearerToken(header: string | undefined): string | undefined {
  return header && header.startsWith('Bearer ') ? header.slice(7) : undefined;
}
