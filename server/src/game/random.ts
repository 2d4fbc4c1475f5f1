import type { Rng, Side } from '../types/game';

export const defaultRng: Rng = Math.random;

export function randomInt(rng: Rng, n: number): number {
  // guard against a source that returns exactly 1
  return Math.min(n - 1, Math.floor(rng() * n));
}

export function pick<T>(rng: Rng, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  return items[randomInt(rng, items.length)];
}

export function randomSide(rng: Rng): Side {
  return rng() < 0.5 ? 'A' : 'B';
}
