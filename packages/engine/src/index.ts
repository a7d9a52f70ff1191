export * from './types.js';
export {
  BOARD_SIZE,
  ALL_POSITIONS,
  emptyBoard,
  getCell,
  isValidPosition,
  isEmptyAt,
  countMoves,
  isFull,
  emptyCells,
  boardsEqual,
  makeMove,
} from './board.js';
export { WINNING_LINES, lineWinner, isWinningLine, findWinningLine, checkWinner, isGameOver } from './winner.js';
export { nextPlayer, selectStrategy, createGame, playTurn, playFrom, playGame } from './game.js';
export {
  NO_MOVE,
  CENTER,
  CORNERS,
  STRATEGY_IDS,
  type StrategyId,
  createRandomStrategy,
  randomStrategy,
  firstAvailableStrategy,
  centerFirstStrategy,
  resolveStrategy,
} from './ai/strategies.js';
export { type CellChar, cellToChar, charToCell, boardToString, boardToRows, parseBoard } from './format.js';
