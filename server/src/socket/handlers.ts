import { moveSchema, newGameSchema } from '../lib/payloads';
import type { GameErrorCode, GameService } from '../services/gameService';
import type { GameView } from '../render/gameView';
import type { MoveApplied, Outcome, PartyResult } from '../types/game';

export interface ClientToServerEvents {
  'game:new': (payload?: unknown) => void;
  'game:move': (payload: unknown) => void;
  'game:sides': () => void;
  'game:reset': () => void;
  'game:get': () => void;
}

export interface ServerToClientEvents {
  'game:state': (view: GameView) => void;
  'game:moved': (moves: { human: MoveApplied; opponent: MoveApplied | null }) => void;
  'game:ended': (end: { outcome: Outcome; result: PartyResult }) => void;
  'game:error': (err: { error: GameErrorCode }) => void;
}

/** One server event with its payload, in the order it is emitted. */
export type Outbound = {
  [E in keyof ServerToClientEvents]: { event: E; data: Parameters<ServerToClientEvents[E]>[0] };
}[keyof ServerToClientEvents];

function failed(error: GameErrorCode): Outbound[] {
  return [{ event: 'game:error', data: { error } }];
}

export function handleNewGame(games: GameService, userId: string, payload: unknown): Outbound[] {
  const parsed = newGameSchema.safeParse(payload);
  if (!parsed.success) return failed('invalid_payload');
  return [{ event: 'game:state', data: games.startNewGame(userId, parsed.data.mode) }];
}

export function handleMove(games: GameService, userId: string, payload: unknown): Outbound[] {
  const parsed = moveSchema.safeParse(payload);
  if (!parsed.success) return failed('invalid_payload');

  const result = games.playTurn(userId, parsed.data.row, parsed.data.col);
  if (!result.ok) return failed(result.error);

  const out: Outbound[] = [
    { event: 'game:moved', data: { human: result.human, opponent: result.opponent } },
    { event: 'game:state', data: result.view },
  ];
  if (result.view.result !== null) {
    out.push({ event: 'game:ended', data: { outcome: result.view.outcome, result: result.view.result } });
  }
  return out;
}

export function handleSides(games: GameService, userId: string): Outbound[] {
  const result = games.reassignSides(userId);
  if (!result.ok) return failed(result.error);
  return [{ event: 'game:state', data: result.view }];
}

export function handleReset(games: GameService, userId: string): Outbound[] {
  return [{ event: 'game:state', data: games.resetGame(userId) }];
}

export function handleGet(games: GameService, userId: string): Outbound[] {
  return [{ event: 'game:state', data: games.getView(userId) }];
}
