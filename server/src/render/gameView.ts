import type { GameState } from '../game/gameState';
import type { Cell, GameMode, Outcome, Party, PartyResult, Side, SideAssignment } from '../types/game';

export const MARK_LABELS: Record<Side, string> = { A: '❌', B: '⭕' };
export const EMPTY_LABEL = '⬜';

export interface ViewButton {
  text: string;
  action: string;
}

export interface GameView {
  mode: GameMode;
  board: Cell[][];
  currentMover: Party;
  outcome: Outcome;
  result: PartyResult;
  sides: SideAssignment;
  message: string;
  keyboard: ViewButton[][];
}

export function cellLabel(cell: Cell): string {
  return cell ? MARK_LABELS[cell] : EMPTY_LABEL;
}

export function moveAction(row: number, col: number): string {
  return `move_${row}_${col}`;
}

export const NEW_GAME_ACTION = 'new_game';

export function statusMessage(game: GameState): string {
  const result = game.resolveOutcomeToParty();
  const mine = MARK_LABELS[game.sides.human];
  const theirs = MARK_LABELS[game.sides.opponent];

  if (game.mode === 'randomized') {
    switch (result) {
      case 'human':
        return `🎉 You won!\n\nYour side was ${mine}!\nThe random marks lined up for you! 🍀`;
      case 'opponent':
        return `😢 You lost!\n\nYour side was ${mine}!\nThe bot played ${theirs}. Try again! 💪`;
      case 'draw':
        return `🤝 Draw!\n\nYour side was ${mine}.\nGood game!`;
      case null:
        return `🎲 Randomized mode\n\nEvery move places a random mark!\nYour side: ${mine}\nYour move:`;
    }
  }

  switch (result) {
    case 'human':
      return `🎉 You won! ${mine} wins!\n\nIncredible! 🏆`;
    case 'opponent':
      return `😢 You lost! ${theirs} wins!\n\nTry again! 💪`;
    case 'draw':
      return '🤝 Draw!\n\nGood game!';
    case null:
      return `🎮 Game in progress\n\nYour move (${mine}):`;
  }
}

// Marks are always shown as placed, even mid-game in randomized mode.
export function buildKeyboard(board: Cell[][]): ViewButton[][] {
  const rows: ViewButton[][] = board.map((cells, row) =>
    cells.map((cell, col) => ({ text: cellLabel(cell), action: moveAction(row, col) }))
  );
  rows.push([{ text: '🔄 New game', action: NEW_GAME_ACTION }]);
  return rows;
}

export function toGameView(game: GameState): GameView {
  const board = game.getBoard();
  return {
    mode: game.mode,
    board,
    currentMover: game.currentMover,
    outcome: game.getOutcome(),
    result: game.resolveOutcomeToParty(),
    sides: game.sides,
    message: statusMessage(game),
    keyboard: buildKeyboard(board),
  };
}
