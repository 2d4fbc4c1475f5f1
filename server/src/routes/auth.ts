import { Router } from 'express';
import { ZodError } from 'zod';
import { v4 as uuid } from 'uuid';
import { guestSchema } from '../lib/payloads';
import { signToken } from '../lib/jwt';

const router = Router();

// Identities live only as long as the token; there is no user store.
router.post('/auth/guest', (req, res) => {
  try {
    const body = guestSchema.parse(req.body);
    const user = { id: `guest:${uuid()}`, username: body.username };
    const token = signToken(user);
    res.json({ token, user });
  } catch (err) {
    if (err instanceof ZodError) return res.status(400).json({ error: 'invalid_input', details: err.issues });
    console.error('[auth] guest token failed', err);
    res.status(500).json({ error: 'guest_failed' });
  }
});

export default router;
