import type { Board, Cell, MoveResult, Player, Position } from './types.js';

export const BOARD_SIZE = 3;

export const ALL_POSITIONS: readonly Position[] = Object.freeze(
  Array.from({ length: BOARD_SIZE * BOARD_SIZE }, (_, i) =>
    Object.freeze({ r: Math.floor(i / BOARD_SIZE), c: i % BOARD_SIZE })
  )
);

function freezeBoard(rows: Cell[][]): Board {
  return Object.freeze(rows.map((row) => Object.freeze(row)));
}

export function emptyBoard(): Board {
  return freezeBoard(Array.from({ length: BOARD_SIZE }, () => Array<Cell>(BOARD_SIZE).fill(null)));
}

export function isValidPosition(pos: Position): boolean {
  const { r, c } = pos;
  return Number.isInteger(r) && Number.isInteger(c) && r >= 0 && c >= 0 && r < BOARD_SIZE && c < BOARD_SIZE;
}

// Out-of-range reads are answered with an empty cell.
export function getCell(board: Board, pos: Position): Cell {
  return isValidPosition(pos) ? board[pos.r][pos.c] : null;
}

/** Also true off the board; pair with `isValidPosition` when that matters. */
export function isEmptyAt(board: Board, pos: Position): boolean {
  return getCell(board, pos) === null;
}

export function countMoves(board: Board): number {
  return ALL_POSITIONS.filter((p) => board[p.r][p.c] !== null).length;
}

export function isFull(board: Board): boolean {
  return countMoves(board) === BOARD_SIZE * BOARD_SIZE;
}

export function emptyCells(board: Board): Position[] {
  return ALL_POSITIONS.filter((p) => board[p.r][p.c] === null);
}

export function boardsEqual(a: Board, b: Board): boolean {
  return ALL_POSITIONS.every((p) => getCell(a, p) === getCell(b, p));
}

function place(board: Board, pos: Position, player: Player): Board {
  return freezeBoard(board.map((row, r) => row.map((cell, c) => (r === pos.r && c === pos.c ? player : cell))));
}

/**
 * Places `player` at `pos` on a copy of `board`. Turn order is not checked:
 * any mark is accepted on any valid empty cell.
 */
export function makeMove(board: Board, pos: Position, player: Player): MoveResult {
  if (!isValidPosition(pos)) {
    return { ok: false, reason: 'out-of-bounds' };
  }
  if (board[pos.r][pos.c] !== null) {
    return { ok: false, reason: 'occupied' };
  }
  return { ok: true, board: place(board, pos, player) };
}
