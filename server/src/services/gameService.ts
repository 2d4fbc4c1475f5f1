import { chooseMove } from '../game/opponent';
import { toGameView, type GameView } from '../render/gameView';
import type { GameMode, ModeRejection, MoveApplied, MoveRejection, Rng } from '../types/game';
import { createSession, type GameSession, type SessionStore } from './sessionStore';

export type GameErrorCode = MoveRejection | ModeRejection | 'invalid_payload';

export type ServiceResult<T> = ({ ok: true } & T) | { ok: false; error: GameErrorCode };

export interface TurnOutcome {
  human: MoveApplied;
  opponent: MoveApplied | null;
  view: GameView;
}

export interface GameServiceOptions {
  store: SessionStore;
  defaultMode: GameMode;
  rng?: Rng;
  now?: () => number;
}

export class GameService {
  private readonly store: SessionStore;
  private readonly defaultMode: GameMode;
  private readonly rng?: Rng;
  private readonly now: () => number;

  constructor(opts: GameServiceOptions) {
    this.store = opts.store;
    this.defaultMode = opts.defaultMode;
    this.rng = opts.rng;
    this.now = opts.now ?? Date.now;
  }

  /** Replaces the session's game; without a mode the previous one is kept. */
  startNewGame(key: string, mode?: GameMode): GameView {
    const previous = this.store.get(key);
    const nextMode = mode ?? previous?.game.mode ?? this.defaultMode;
    const session = createSession(nextMode, this.rng, this.now());
    this.store.set(key, session);
    const { human, opponent } = session.game.sides;
    console.log(`[game] new ${nextMode} game for ${key} (human=${human}, opponent=${opponent})`);
    return toGameView(session.game);
  }

  playTurn(key: string, row: number, col: number): ServiceResult<TurnOutcome> {
    const session = this.ensureSession(key);
    const { game } = session;

    const human = game.applyMove(row, col);
    if (!human.ok) return human;

    let opponent: MoveApplied | null = null;
    if (!game.isOver()) {
      const reply = chooseMove(session.opponent, game);
      if (!reply.ok) return reply;
      opponent = reply.move;
    }

    if (game.isOver()) {
      console.log(`[game] finished for ${key}: ${game.getOutcome().status} -> ${game.resolveOutcomeToParty()}`);
    }
    return { ok: true, human, opponent, view: toGameView(game) };
  }

  reassignSides(key: string): ServiceResult<{ view: GameView }> {
    const session = this.ensureSession(key);
    const rolled = session.game.assignSidesRandomly();
    if (!rolled.ok) return rolled;
    return { ok: true, view: toGameView(session.game) };
  }

  /** Fresh board in the same game; mode and sides are kept. */
  resetGame(key: string): GameView {
    const session = this.ensureSession(key);
    session.game.reset();
    return toGameView(session.game);
  }

  getView(key: string): GameView {
    return toGameView(this.ensureSession(key).game);
  }

  private ensureSession(key: string): GameSession {
    let session = this.store.get(key);
    if (!session) {
      session = createSession(this.defaultMode, this.rng, this.now());
      this.store.set(key, session);
    }
    session.lastActiveAt = this.now();
    return session;
  }
}
