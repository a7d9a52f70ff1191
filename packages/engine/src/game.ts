import type { GameResult, GameState, Player, Strategy, TurnResult } from './types.js';
import { emptyBoard, makeMove } from './board.js';
import { checkWinner, isGameOver } from './winner.js';

export function nextPlayer(p: Player): Player {
  return p === 'X' ? 'O' : 'X';
}

export function selectStrategy(player: Player, xStrategy: Strategy, oStrategy: Strategy): Strategy {
  return player === 'X' ? xStrategy : oStrategy;
}

export function createGame(): GameState {
  return {
    board: emptyBoard(),
    current: 'X',
    moves: [],
  };
}

export function playTurn(state: GameState, strategy: Strategy): TurnResult {
  const player = state.current;
  const target = strategy(state.board, player);
  const result = makeMove(state.board, target, player);
  if (!result.ok) {
    return { ok: false, reason: result.reason, attempted: { r: target.r, c: target.c } };
  }
  return {
    ok: true,
    state: {
      board: result.board,
      current: nextPlayer(player),
      moves: [...state.moves, { r: target.r, c: target.c, player }],
    },
  };
}

/**
 * Plays `state` out to the end. A rejected position stops the game with no
 * winner, the same shape as a draw; `ending` and `rejected` tell the two apart.
 * Each turn fills a cell, so recursion is at most nine frames deep.
 */
export function playFrom(state: GameState, xStrategy: Strategy, oStrategy: Strategy): GameResult {
  if (isGameOver(state.board)) {
    const winner = checkWinner(state.board);
    return {
      board: state.board,
      winner,
      ending: winner ? 'win' : 'draw',
      moves: state.moves,
    };
  }

  const turn = playTurn(state, selectStrategy(state.current, xStrategy, oStrategy));
  if (!turn.ok) {
    return {
      board: state.board,
      winner: null,
      ending: 'forfeit',
      moves: state.moves,
      rejected: { player: state.current, position: turn.attempted, reason: turn.reason },
    };
  }
  return playFrom(turn.state, xStrategy, oStrategy);
}

export function playGame(xStrategy: Strategy, oStrategy: Strategy): GameResult {
  return playFrom(createGame(), xStrategy, oStrategy);
}
