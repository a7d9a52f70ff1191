import { z } from 'zod';
import {
  STRATEGY_IDS,
  boardToRows,
  boardToString,
  checkWinner,
  isGameOver,
  isValidPosition,
  makeMove,
  parseBoard,
  playGame,
  resolveStrategy,
  type Board,
  type MoveRejection,
  type RandomIndex,
} from '@purettt/engine';

const PlayerSchema = z.enum(['X', 'O']);
const StrategySchema = z.enum(STRATEGY_IDS);
const PositionSchema = z.object({ r: z.number().int(), c: z.number().int() });

const BoardSchema = z.string().transform((value, ctx): Board => {
  const parsed = parseBoard(value);
  if (!parsed.ok) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.reason });
    return z.NEVER;
  }
  return parsed.board;
});

export const MoveInput = z.object({
  board: BoardSchema,
  player: PlayerSchema,
  strategy: StrategySchema,
});

export const MoveOutput = z.object({
  move: PositionSchema.nullable(),
  strategy: StrategySchema,
});

export const ApplyInput = z.object({
  board: BoardSchema,
  player: PlayerSchema,
  move: PositionSchema,
});

export const ApplyOutput = z.object({
  board: z.array(z.string()),
  winner: PlayerSchema.nullable(),
  gameOver: z.boolean(),
});

export const PlayInput = z.object({
  x: StrategySchema,
  o: StrategySchema,
});

export const PlayOutput = z.object({
  board: z.array(z.string()),
  text: z.string(),
  winner: PlayerSchema.nullable(),
  ending: z.enum(['win', 'draw', 'forfeit']),
  moves: z.array(PositionSchema.extend({ player: PlayerSchema })),
  rejected: z
    .object({
      player: PlayerSchema,
      position: PositionSchema,
      reason: z.enum(['out-of-bounds', 'occupied']),
    })
    .optional(),
});

export const SeriesOutput = z.object({
  games: z.number().int(),
  tally: z.object({
    X: z.number().int(),
    O: z.number().int(),
    draw: z.number().int(),
    forfeit: z.number().int(),
  }),
});

export interface FlowDeps {
  randomIndex?: RandomIndex;
}

export type ApplyResult =
  | { ok: true; output: z.infer<typeof ApplyOutput> }
  | { ok: false; reason: MoveRejection };

export function chooseMove(payload: unknown, deps: FlowDeps = {}): z.infer<typeof MoveOutput> {
  const { board, player, strategy } = MoveInput.parse(payload);
  const target = resolveStrategy(strategy, deps.randomIndex)(board, player);
  const move = isValidPosition(target) ? { r: target.r, c: target.c } : null;
  console.debug('[arena] chooseMove', { strategy, player, move });
  return MoveOutput.parse({ move, strategy });
}

export function applyMove(payload: unknown): ApplyResult {
  const { board, player, move } = ApplyInput.parse(payload);
  const result = makeMove(board, move, player);
  if (!result.ok) {
    console.info('[arena] Rejected move', { player, move, reason: result.reason });
    return { ok: false, reason: result.reason };
  }
  return {
    ok: true,
    output: ApplyOutput.parse({
      board: boardToRows(result.board),
      winner: checkWinner(result.board),
      gameOver: isGameOver(result.board),
    }),
  };
}

export function playMatch(payload: unknown, deps: FlowDeps = {}): z.infer<typeof PlayOutput> {
  const { x, o } = PlayInput.parse(payload);
  const result = playGame(resolveStrategy(x, deps.randomIndex), resolveStrategy(o, deps.randomIndex));
  console.info('[arena] Match finished', {
    x,
    o,
    winner: result.winner,
    ending: result.ending,
    moves: result.moves.length,
  });
  return PlayOutput.parse({
    board: boardToRows(result.board),
    text: boardToString(result.board),
    winner: result.winner,
    ending: result.ending,
    moves: result.moves,
    rejected: result.rejected,
  });
}

export function playSeries(
  payload: unknown,
  maxGames: number,
  deps: FlowDeps = {}
): z.infer<typeof SeriesOutput> {
  const { x, o, games } = PlayInput.extend({
    games: z.number().int().min(1).max(maxGames),
  }).parse(payload);
  const xStrategy = resolveStrategy(x, deps.randomIndex);
  const oStrategy = resolveStrategy(o, deps.randomIndex);

  const tally = { X: 0, O: 0, draw: 0, forfeit: 0 };
  for (let i = 0; i < games; i++) {
    const result = playGame(xStrategy, oStrategy);
    if (result.winner) {
      tally[result.winner]++;
    } else if (result.ending === 'forfeit') {
      tally.forfeit++;
    } else {
      tally.draw++;
    }
  }
  console.info('[arena] Series finished', { x, o, games, tally });
  return SeriesOutput.parse({ games, tally });
}
