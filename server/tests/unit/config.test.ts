import { loadEnv } from '../../src/config/env';
import { guestSchema, moveSchema, newGameSchema } from '../../src/lib/payloads';

describe('loadEnv', () => {
  it('falls back to defaults', () => {
    expect(loadEnv({})).toEqual({
      nodeEnv: 'development',
      port: 4000,
      corsOrigin: '*',
      jwtSecret: 'dev_secret_change_me',
      defaultMode: 'deterministic',
      sessionIdleTtlSeconds: 3600,
      sessionSweepIntervalSeconds: 60,
    });
  });

  it('coerces numeric values', () => {
    const env = loadEnv({ PORT: '8080', DEFAULT_MODE: 'randomized', SESSION_IDLE_TTL_SECONDS: '30' });
    expect(env.port).toBe(8080);
    expect(env.defaultMode).toBe('randomized');
    expect(env.sessionIdleTtlSeconds).toBe(30);
  });

  it('rejects invalid values', () => {
    expect(() => loadEnv({ PORT: 'eighty' })).toThrow();
    expect(() => loadEnv({ DEFAULT_MODE: 'chaos' })).toThrow();
  });
});

describe('payload schemas', () => {
  it('accepts a missing new-game payload', () => {
    expect(newGameSchema.parse(undefined)).toEqual({});
    expect(newGameSchema.parse({ mode: 'randomized' })).toEqual({ mode: 'randomized' });
    expect(newGameSchema.safeParse({ mode: 'classic' }).success).toBe(false);
  });

  it('requires integer coordinates but leaves range checks to the engine', () => {
    expect(moveSchema.parse({ row: 5, col: -1 })).toEqual({ row: 5, col: -1 });
    expect(moveSchema.safeParse({ row: '1', col: 1 }).success).toBe(false);
    expect(moveSchema.safeParse({ row: 0.5, col: 1 }).success).toBe(false);
  });

  it('validates guest usernames', () => {
    expect(guestSchema.safeParse({ username: 'alice_1' }).success).toBe(true);
    expect(guestSchema.safeParse({ username: 'al' }).success).toBe(false);
    expect(guestSchema.safeParse({ username: 'bad name' }).success).toBe(false);
  });
});
