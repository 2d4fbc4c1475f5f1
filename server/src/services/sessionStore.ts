import { GameState } from '../game/gameState';
import { strategyForMode, type OpponentStrategy } from '../game/opponent';
import type { GameMode, Rng } from '../types/game';

export interface GameSession {
  game: GameState;
  opponent: OpponentStrategy;
  lastActiveAt: number;
}

/** The only place a game gets paired with an opponent strategy. */
export function createSession(mode: GameMode, rng?: Rng, now: number = Date.now()): GameSession {
  const game = new GameState({ mode, rng });
  return { game, opponent: strategyForMode(mode, rng), lastActiveAt: now };
}

/**
 * Session key -> game. Sessions are replaced wholesale on a new game, never
 * merged. Callers run on the event loop, so one key never sees two writers at
 * once as long as nothing awaits between reading and writing a session.
 */
export class SessionStore {
  private readonly sessions = new Map<string, GameSession>();

  constructor(private readonly idleTtlMs: number) {}

  get(key: string): GameSession | undefined {
    return this.sessions.get(key);
  }

  set(key: string, session: GameSession): void {
    this.sessions.set(key, session);
  }

  delete(key: string): boolean {
    return this.sessions.delete(key);
  }

  get size(): number {
    return this.sessions.size;
  }

  keys(): string[] {
    return Array.from(this.sessions.keys());
  }

  /** Drops sessions idle for longer than the TTL and returns their keys. */
  evictIdle(now: number = Date.now()): string[] {
    const evicted: string[] = [];
    for (const [key, s] of this.sessions) {
      if (now - s.lastActiveAt > this.idleTtlMs) {
        this.sessions.delete(key);
        evicted.push(key);
      }
    }
    return evicted;
  }
}
