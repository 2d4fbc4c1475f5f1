export * from '../types/game';
export { GameState, FIXED_SIDES, type GameOptions } from './gameState';
export { chooseMove, strategyForMode, type OpponentStrategy } from './opponent';
export { bestMove } from './ai/minimax';
export { emptyCells, findWinningSide } from './board';
