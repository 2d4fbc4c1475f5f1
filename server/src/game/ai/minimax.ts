import type { Board, Coord, Party, SideAssignment } from '../../types/game';
import { cloneBoard, emptyCells, findWinningSide, isFull } from '../board';

const WIN_SCORE = 10;

function terminalScore(board: Board, sides: SideAssignment): number | null {
  const winner = findWinningSide(board);
  if (winner === sides.opponent) return WIN_SCORE;
  if (winner === sides.human) return -WIN_SCORE;
  if (isFull(board)) return 0;
  return null;
}

// Exhaustive; mutates `board` in place and restores every cell it touches.
function minimax(board: Board, toMove: Party, sides: SideAssignment): number {
  const terminal = terminalScore(board, sides);
  if (terminal !== null) return terminal;

  const maximizing = toMove === 'opponent';
  const next: Party = maximizing ? 'human' : 'opponent';
  let best = maximizing ? -Infinity : Infinity;
  for (const { row, col } of emptyCells(board)) {
    board[row][col] = sides[toMove];
    const score = minimax(board, next, sides);
    board[row][col] = null;
    best = maximizing ? Math.max(best, score) : Math.min(best, score);
  }
  return best;
}

/**
 * Best cell for `toMove`: the opponent maximises, the human minimises.
 * Ties keep the first cell in row-major order. Returns null on a finished
 * or full board. The caller's board is never written to.
 */
export function bestMove(board: Board, toMove: Party, sides: SideAssignment): Coord | null {
  const scratch = cloneBoard(board);
  if (terminalScore(scratch, sides) !== null) return null;

  const maximizing = toMove === 'opponent';
  const next: Party = maximizing ? 'human' : 'opponent';
  let best: Coord | null = null;
  let bestScore = maximizing ? -Infinity : Infinity;

  for (const cell of emptyCells(scratch)) {
    scratch[cell.row][cell.col] = sides[toMove];
    const score = minimax(scratch, next, sides);
    scratch[cell.row][cell.col] = null;
    if (maximizing ? score > bestScore : score < bestScore) {
      bestScore = score;
      best = cell;
    }
  }
  return best;
}
