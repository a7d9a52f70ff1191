import type { Board, Cell } from './types.js';
import { BOARD_SIZE } from './board.js';

export type CellChar = 'X' | 'O' | ' ';

export function cellToChar(cell: Cell): CellChar {
  return cell === 'X' ? 'X' : cell === 'O' ? 'O' : ' ';
}

export function charToCell(ch: string): Cell {
  return ch === 'X' ? 'X' : ch === 'O' ? 'O' : null;
}

const ROW_SEPARATOR = '---|---|---\n';

export function boardToString(board: Board): string {
  return board.map((row) => ` ${row.map(cellToChar).join(' | ')} \n`).join(ROW_SEPARATOR);
}

export function boardToRows(board: Board): string[] {
  return board.map((row) => row.map(cellToChar).join(''));
}

/**
 * Reads a board written as nine cell characters, optionally split into rows
 * with '/' or line breaks ("XO /   /  X"). Unknown characters are empty cells.
 */
export function parseBoard(text: string): { ok: true; board: Board } | { ok: false; reason: string } {
  const cells = Array.from(text.replace(/[/\r\n]/g, ''));
  if (cells.length !== BOARD_SIZE * BOARD_SIZE) {
    return { ok: false, reason: `expected ${BOARD_SIZE * BOARD_SIZE} cells, got ${cells.length}` };
  }
  const rows = Array.from({ length: BOARD_SIZE }, (_, r) =>
    Object.freeze(cells.slice(r * BOARD_SIZE, (r + 1) * BOARD_SIZE).map(charToCell))
  );
  return { ok: true, board: Object.freeze(rows) };
}
