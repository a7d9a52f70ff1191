import type { Board, Position, RandomIndex, Strategy } from '../types.js';
import { emptyCells, isEmptyAt } from '../board.js';

/** Returned when the board has no empty cell left; `makeMove` always rejects it. */
export const NO_MOVE: Position = Object.freeze({ r: -1, c: -1 });

export const CENTER: Position = Object.freeze({ r: 1, c: 1 });

export const CORNERS: readonly Position[] = Object.freeze([
  Object.freeze({ r: 0, c: 0 }),
  Object.freeze({ r: 0, c: 2 }),
  Object.freeze({ r: 2, c: 0 }),
  Object.freeze({ r: 2, c: 2 }),
]);

const mathRandomIndex: RandomIndex = (n) => Math.floor(Math.random() * n);

function clampIndex(value: number, length: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(length - 1, Math.max(0, Math.floor(value)));
}

/**
 * Uniform choice among the empty cells. The random source is the only impure
 * input in the engine, so it is passed in rather than reached for.
 */
export function createRandomStrategy(randomIndex: RandomIndex = mathRandomIndex): Strategy {
  return (board) => {
    const moves = emptyCells(board);
    if (moves.length === 0) {
      return NO_MOVE;
    }
    return moves[clampIndex(randomIndex(moves.length), moves.length)];
  };
}

export const randomStrategy: Strategy = createRandomStrategy();

export function firstAvailableStrategy(board: Board): Position {
  const moves = emptyCells(board);
  return moves.length === 0 ? NO_MOVE : moves[0];
}

export function centerFirstStrategy(board: Board): Position {
  if (isEmptyAt(board, CENTER)) {
    return CENTER;
  }
  return CORNERS.find((corner) => isEmptyAt(board, corner)) ?? firstAvailableStrategy(board);
}

export const STRATEGY_IDS = ['random', 'firstAvailable', 'centerFirst'] as const;
export type StrategyId = (typeof STRATEGY_IDS)[number];

export function resolveStrategy(id: StrategyId, randomIndex?: RandomIndex): Strategy {
  switch (id) {
    case 'random':
      return randomIndex ? createRandomStrategy(randomIndex) : randomStrategy;
    case 'firstAvailable':
      return firstAvailableStrategy;
    case 'centerFirst':
    default:
      return centerFirstStrategy;
  }
}
