import { describe, expect, it, vi } from 'vitest';
import { emptyBoard, emptyCells } from '../board.js';
import { parseBoard } from '../format.js';
import {
  NO_MOVE,
  centerFirstStrategy,
  createRandomStrategy,
  firstAvailableStrategy,
  randomStrategy,
  resolveStrategy,
} from '../ai/strategies.js';
import type { Board } from '../types.js';

function board(text: string): Board {
  const parsed = parseBoard(text);
  if (!parsed.ok) {
    throw new Error(parsed.reason);
  }
  return parsed.board;
}

const FULL = board('XOX/XOO/OXX');

describe('firstAvailableStrategy', () => {
  it('takes the first empty cell in row-major order', () => {
    expect(firstAvailableStrategy(emptyBoard())).toEqual({ r: 0, c: 0 });
    expect(firstAvailableStrategy(board('XOX/O  /   '))).toEqual({ r: 1, c: 1 });
  });

  it('returns the sentinel on a full board', () => {
    expect(firstAvailableStrategy(FULL)).toBe(NO_MOVE);
  });
});

describe('centerFirstStrategy', () => {
  it('prefers the centre', () => {
    expect(centerFirstStrategy(board('X  /   /   '))).toEqual({ r: 1, c: 1 });
  });

  it('falls back to corners in fixed order', () => {
    expect(centerFirstStrategy(board('   / X /   '))).toEqual({ r: 0, c: 0 });
    expect(centerFirstStrategy(board('X  / O /   '))).toEqual({ r: 0, c: 2 });
    expect(centerFirstStrategy(board('X O/ X /   '))).toEqual({ r: 2, c: 0 });
    expect(centerFirstStrategy(board('X O/ X /O  '))).toEqual({ r: 2, c: 2 });
  });

  it('uses the first free edge once centre and corners are taken', () => {
    expect(centerFirstStrategy(board('X O/ X /O X'))).toEqual({ r: 0, c: 1 });
    expect(centerFirstStrategy(board('XOO/ X /O X'))).toEqual({ r: 1, c: 0 });
  });

  it('returns the sentinel on a full board', () => {
    expect(centerFirstStrategy(FULL)).toBe(NO_MOVE);
  });
});

describe('createRandomStrategy', () => {
  it('indexes into the empty cells with the injected source', () => {
    const b = board('XO /   /   ');
    const source = vi.fn((n: number) => n - 1);
    const strategy = createRandomStrategy(source);

    expect(strategy(b, 'X')).toEqual({ r: 2, c: 2 });
    expect(source).toHaveBeenCalledWith(7);
  });

  it('clamps a misbehaving source into range', () => {
    const b = board('XO /   /   ');
    expect(createRandomStrategy(() => 99)(b, 'O')).toEqual({ r: 2, c: 2 });
    expect(createRandomStrategy(() => -4)(b, 'O')).toEqual({ r: 0, c: 2 });
    expect(createRandomStrategy(() => Number.NaN)(b, 'O')).toEqual({ r: 0, c: 2 });
  });

  it('does not consult the source when nothing is free', () => {
    const source = vi.fn(() => 0);
    expect(createRandomStrategy(source)(FULL, 'X')).toBe(NO_MOVE);
    expect(source).not.toHaveBeenCalled();
  });

  it('always lands on an empty cell with the default source', () => {
    const b = board('X O/ X /O  ');
    const free = emptyCells(b);
    for (let i = 0; i < 50; i++) {
      expect(free).toContainEqual(randomStrategy(b, 'O'));
    }
  });
});

describe('resolveStrategy', () => {
  it('maps ids to strategies', () => {
    expect(resolveStrategy('firstAvailable')).toBe(firstAvailableStrategy);
    expect(resolveStrategy('centerFirst')).toBe(centerFirstStrategy);
    expect(resolveStrategy('random')).toBe(randomStrategy);
  });

  it('builds a random strategy around a given source', () => {
    const strategy = resolveStrategy('random', () => 0);
    expect(strategy).not.toBe(randomStrategy);
    expect(strategy(emptyBoard(), 'X')).toEqual({ r: 0, c: 0 });
  });
});
