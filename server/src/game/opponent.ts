import type { Coord, GameMode, OpponentMoveResult, Rng } from '../types/game';
import type { GameState } from './gameState';
import { bestMove } from './ai/minimax';
import { emptyCells } from './board';
import { defaultRng, pick } from './random';

export type OpponentStrategy =
  | { kind: 'adversarial_search' }
  | { kind: 'random_placement'; rng: Rng };

export function strategyForMode(mode: GameMode, rng: Rng = defaultRng): OpponentStrategy {
  return mode === 'deterministic' ? { kind: 'adversarial_search' } : { kind: 'random_placement', rng };
}

function pickCell(strategy: OpponentStrategy, game: GameState): Coord | null {
  const board = game.getBoard();
  switch (strategy.kind) {
    case 'adversarial_search':
      return bestMove(board, game.currentMover, game.sides);
    case 'random_placement':
      return pick(strategy.rng, emptyCells(board)) ?? null;
  }
}

/**
 * Picks a cell for whoever is to move and applies it through
 * `GameState.applyMove`. `move` is null when the game is already over.
 * Search only runs on deterministic games.
 */
export function chooseMove(strategy: OpponentStrategy, game: GameState): OpponentMoveResult {
  if (strategy.kind === 'adversarial_search' && game.mode !== 'deterministic') {
    return { ok: false, error: 'invalid_mode_operation' };
  }
  if (game.isOver()) return { ok: true, move: null };

  const cell = pickCell(strategy, game);
  if (!cell) return { ok: true, move: null };

  const applied = game.applyMove(cell.row, cell.col);
  if (!applied.ok) return applied;
  return { ok: true, move: applied };
}
