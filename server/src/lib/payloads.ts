import { z } from 'zod';

export const modeSchema = z.enum(['deterministic', 'randomized']);

export const newGameSchema = z
  .object({ mode: modeSchema.optional() })
  .optional()
  .transform((v) => v ?? {});

// Range checks belong to the engine, which reports out_of_bounds.
export const moveSchema = z.object({
  row: z.number().int(),
  col: z.number().int(),
});

export const guestSchema = z.object({
  username: z.string().min(3).max(30).regex(/^[a-zA-Z0-9_]+$/),
});
