import type { Board, Cell, Line } from './types.js';
import { getCell, isFull } from './board.js';

function line(...cells: [[number, number], [number, number], [number, number]]): Line {
  const [a, b, c] = cells.map(([r, col]) => Object.freeze({ r, c: col }));
  const positions: Line = [a, b, c];
  return Object.freeze(positions);
}

// Scan order matters for boards no legal game can reach: first match wins.
export const WINNING_LINES: readonly Line[] = Object.freeze([
  line([0, 0], [0, 1], [0, 2]),
  line([1, 0], [1, 1], [1, 2]),
  line([2, 0], [2, 1], [2, 2]),
  line([0, 0], [1, 0], [2, 0]),
  line([0, 1], [1, 1], [2, 1]),
  line([0, 2], [1, 2], [2, 2]),
  line([0, 0], [1, 1], [2, 2]),
  line([0, 2], [1, 1], [2, 0]),
]);

export function lineWinner(board: Board, l: Line): Cell {
  const first = getCell(board, l[0]);
  return first !== null && l.every((p) => getCell(board, p) === first) ? first : null;
}

export function isWinningLine(board: Board, l: Line): boolean {
  return lineWinner(board, l) !== null;
}

export function findWinningLine(board: Board): Line | null {
  return WINNING_LINES.find((l) => isWinningLine(board, l)) ?? null;
}

export function checkWinner(board: Board): Cell {
  const winning = findWinningLine(board);
  return winning ? lineWinner(board, winning) : null;
}

export function isGameOver(board: Board): boolean {
  return checkWinner(board) !== null || isFull(board);
}
