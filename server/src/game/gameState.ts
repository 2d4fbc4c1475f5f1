import type {
  Board,
  Cell,
  GameMode,
  MoveRecord,
  MoveResult,
  Outcome,
  Party,
  PartyResult,
  Rng,
  Side,
  SideAssignment,
  SideResult,
} from '../types/game';
import { cloneBoard, createBoard, findWinningSide, inBounds, isFull, otherSide } from './board';
import { defaultRng, randomSide } from './random';

export const FIXED_SIDES: Readonly<SideAssignment> = { human: 'A', opponent: 'B' };
const IN_PROGRESS: Outcome = { status: 'in_progress' };

export interface GameOptions {
  mode?: GameMode;
  rng?: Rng;
  /** Randomized mode only; rolled from `rng` when omitted. The opponent gets the other side. */
  humanSide?: Side;
}

export function otherParty(p: Party): Party {
  return p === 'human' ? 'opponent' : 'human';
}

/**
 * One game between the human and the computer opponent.
 *
 * The board only changes through `applyMove`, and the outcome is recomputed
 * after every placement. In randomized mode the mark written on each move is
 * drawn independently of the mover, and `sides` decides which party a
 * completed line belongs to.
 */
export class GameState {
  readonly mode: GameMode;
  private readonly rng: Rng;
  private board: Board = createBoard();
  private mover: Party = 'human';
  private outcome: Outcome = IN_PROGRESS;
  private sideAssignment: SideAssignment;
  private history: MoveRecord[] = [];

  constructor(opts: GameOptions = {}) {
    this.mode = opts.mode ?? 'deterministic';
    this.rng = opts.rng ?? defaultRng;
    this.sideAssignment = { ...FIXED_SIDES };
    if (this.mode === 'randomized') {
      if (opts.humanSide) {
        this.sideAssignment = { human: opts.humanSide, opponent: otherSide(opts.humanSide) };
      } else {
        this.rollSides();
      }
    }
  }

  get currentMover(): Party {
    return this.mover;
  }

  get sides(): SideAssignment {
    return { ...this.sideAssignment };
  }

  get moves(): readonly MoveRecord[] {
    return this.history;
  }

  /** Copy of the board; mutating it does not affect the game. */
  getBoard(): Board {
    return cloneBoard(this.board);
  }

  cellAt(row: number, col: number): Cell {
    return inBounds(row, col) ? this.board[row][col] : null;
  }

  getOutcome(): Outcome {
    return this.outcome;
  }

  isOver(): boolean {
    return this.outcome.status !== 'in_progress';
  }

  applyMove(row: number, col: number): MoveResult {
    if (this.isOver()) return { ok: false, error: 'game_over' };
    if (!inBounds(row, col)) return { ok: false, error: 'out_of_bounds' };
    if (this.board[row][col] !== null) return { ok: false, error: 'cell_occupied' };

    const party = this.mover;
    const mark = this.mode === 'randomized' ? randomSide(this.rng) : this.sideAssignment[party];
    this.board[row][col] = mark;
    this.history.push({ row, col, mark, party, at: Date.now() });

    this.outcome = this.computeOutcome();
    if (this.outcome.status === 'in_progress') {
      this.mover = otherParty(party);
    }
    return { ok: true, row, col, mark, party, outcome: this.outcome };
  }

  resolveOutcomeToParty(): PartyResult {
    const o = this.outcome;
    if (o.status === 'in_progress') return null;
    if (o.status === 'draw') return 'draw';
    return o.side === this.sideAssignment.human ? 'human' : 'opponent';
  }

  /** Clears the board and turn order; mode and sides stay as they are. */
  reset(): void {
    this.board = createBoard();
    this.mover = 'human';
    this.outcome = IN_PROGRESS;
    this.history = [];
  }

  assignSidesRandomly(): SideResult {
    if (this.mode !== 'randomized' || this.history.length > 0) {
      return { ok: false, error: 'invalid_mode_operation' };
    }
    this.rollSides();
    return { ok: true, sides: this.sides };
  }

  private rollSides(): void {
    const human = randomSide(this.rng);
    this.sideAssignment = { human, opponent: otherSide(human) };
  }

  private computeOutcome(): Outcome {
    const side = findWinningSide(this.board);
    if (side) return { status: 'won', side };
    if (isFull(this.board)) return { status: 'draw' };
    return IN_PROGRESS;
  }
}
