import { z } from 'zod';

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().positive().default(9191),
  HOST: z.string().min(1).default('0.0.0.0'),
  ARENA_MAX_SERIES_GAMES: z.coerce.number().int().positive().default(500),
});

export interface ArenaConfig {
  port: number;
  host: string;
  maxSeriesGames: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ArenaConfig {
  const parsed = ConfigSchema.safeParse({
    PORT: env.PORT || undefined,
    HOST: env.HOST || undefined,
    ARENA_MAX_SERIES_GAMES: env.ARENA_MAX_SERIES_GAMES || undefined,
  });
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid arena configuration (${details})`);
  }
  return {
    port: parsed.data.PORT,
    host: parsed.data.HOST,
    maxSeriesGames: parsed.data.ARENA_MAX_SERIES_GAMES,
  };
}
