export type Side = 'A' | 'B';
export type Cell = Side | null;
export type Board = Cell[][]; // 3x3, row-major

export type Party = 'human' | 'opponent';
export type GameMode = 'deterministic' | 'randomized';

export interface SideAssignment {
  human: Side;
  opponent: Side;
}

export type Outcome =
  | { status: 'in_progress' }
  | { status: 'won'; side: Side }
  | { status: 'draw' };

export type PartyResult = Party | 'draw' | null;

export interface Coord {
  row: number;
  col: number;
}

export type MoveRejection = 'game_over' | 'out_of_bounds' | 'cell_occupied';
export type ModeRejection = 'invalid_mode_operation';

export interface MoveApplied extends Coord {
  ok: true;
  mark: Side; // random in randomized mode, so callers must read it from here
  party: Party;
  outcome: Outcome;
}

export type MoveResult = MoveApplied | { ok: false; error: MoveRejection };

export type SideResult = { ok: true; sides: SideAssignment } | { ok: false; error: ModeRejection };

export type OpponentMoveResult =
  | { ok: true; move: MoveApplied | null }
  | { ok: false; error: ModeRejection | MoveRejection };

export interface MoveRecord extends Coord {
  mark: Side;
  party: Party;
  at: number; // timestamp
}

/** Uniform source in [0, 1). */
export type Rng = () => number;
