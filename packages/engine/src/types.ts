export type Player = 'X' | 'O';
export type Cell = Player | null; // null is an empty cell

export type Board = readonly (readonly Cell[])[];

export interface Position {
  r: number;
  c: number;
}

export type Line = readonly [Position, Position, Position];

export interface Move extends Position {
  player: Player;
}

export type MoveRejection = 'out-of-bounds' | 'occupied';

export type MoveResult = { ok: true; board: Board } | { ok: false; reason: MoveRejection };

/**
 * Picks the next position for `player`. Must return one of the board's empty
 * cells while any exist, and `NO_MOVE` otherwise.
 */
export type Strategy = (board: Board, player: Player) => Position;

/** Returns an integer in [0, n). */
export type RandomIndex = (n: number) => number;

export interface GameState {
  board: Board;
  current: Player;
  moves: readonly Move[];
}

export type TurnResult =
  | { ok: true; state: GameState }
  | { ok: false; reason: MoveRejection; attempted: Position };

export type GameEnding = 'win' | 'draw' | 'forfeit';

export interface RejectedMove {
  player: Player;
  position: Position;
  reason: MoveRejection;
}

export interface GameResult {
  board: Board;
  winner: Player | null;
  ending: GameEnding;
  moves: readonly Move[];
  rejected?: RejectedMove;
}
