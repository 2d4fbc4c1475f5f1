import type { Board, Cell, Coord, Side } from '../types/game';

export const BOARD_SIZE = 3;

const WIN_LINES: ReadonlyArray<readonly [Coord, Coord, Coord]> = [
  // rows
  [{ row: 0, col: 0 }, { row: 0, col: 1 }, { row: 0, col: 2 }],
  [{ row: 1, col: 0 }, { row: 1, col: 1 }, { row: 1, col: 2 }],
  [{ row: 2, col: 0 }, { row: 2, col: 1 }, { row: 2, col: 2 }],
  // columns
  [{ row: 0, col: 0 }, { row: 1, col: 0 }, { row: 2, col: 0 }],
  [{ row: 0, col: 1 }, { row: 1, col: 1 }, { row: 2, col: 1 }],
  [{ row: 0, col: 2 }, { row: 1, col: 2 }, { row: 2, col: 2 }],
  // diagonals
  [{ row: 0, col: 0 }, { row: 1, col: 1 }, { row: 2, col: 2 }],
  [{ row: 0, col: 2 }, { row: 1, col: 1 }, { row: 2, col: 0 }],
];

export function createBoard(): Board {
  return Array.from({ length: BOARD_SIZE }, () => Array<Cell>(BOARD_SIZE).fill(null));
}

export function cloneBoard(b: Board): Board {
  return b.map((row) => row.slice());
}

export function inBounds(row: number, col: number): boolean {
  return Number.isInteger(row) && Number.isInteger(col) && row >= 0 && col >= 0 && row < BOARD_SIZE && col < BOARD_SIZE;
}

/** Empty cells in row-major order; the search's tie-break depends on this order. */
export function emptyCells(board: Board): Coord[] {
  const out: Coord[] = [];
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      if (board[row][col] === null) out.push({ row, col });
    }
  }
  return out;
}

export function isFull(board: Board): boolean {
  return board.every((row) => row.every((c) => c !== null));
}

/** Side owning the first completed line, or null. */
export function findWinningSide(board: Board): Side | null {
  for (const [a, b, c] of WIN_LINES) {
    const v = board[a.row][a.col];
    if (v && v === board[b.row][b.col] && v === board[c.row][c.col]) {
      return v;
    }
  }
  return null;
}

export function otherSide(s: Side): Side {
  return s === 'A' ? 'B' : 'A';
}
