/**
 * Environment configuration for the endgame AI.
 *
 *   ENDGAME_MAX_DEPTH        deepest iteration (1-8)
 *   ENDGAME_TIME_BUDGET_MS   soft budget per decision
 *   ENDGAME_PROFILE          white-rook | black-rook | auto
 *   ENDGAME_CACHE_CAPACITY   transposition entries per decision (0 disables)
 *   ENDGAME_VERBOSE          1/true to log each decision
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_ENDGAME_AI_CONFIG, type EndgameAIConfig } from './types.js';

const booleanFlag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no'])
  .transform(value => value === '1' || value === 'true' || value === 'yes');

export const EndgameEnvSchema = z.object({
  ENDGAME_MAX_DEPTH: z.coerce.number().int().min(1).max(8).optional(),
  ENDGAME_TIME_BUDGET_MS: z.coerce.number().int().nonnegative().optional(),
  ENDGAME_PROFILE: z.enum(['white-rook', 'black-rook', 'auto']).optional(),
  ENDGAME_CACHE_CAPACITY: z.coerce.number().int().nonnegative().optional(),
  ENDGAME_VERBOSE: booleanFlag.optional(),
});

export type EndgameEnv = z.infer<typeof EndgameEnvSchema>;

/**
 * Build an AI config from environment variables over the defaults
 * @throws ConfigError listing every invalid variable
 */
export function loadEndgameConfig(
  env: Record<string, string | undefined> = process.env
): EndgameAIConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('ENDGAME_') && value !== undefined && value !== '')
  );

  const parsed = EndgameEnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  const capacity = vars.ENDGAME_CACHE_CAPACITY;

  return {
    ...DEFAULT_ENDGAME_AI_CONFIG,
    maxDepth: vars.ENDGAME_MAX_DEPTH ?? DEFAULT_ENDGAME_AI_CONFIG.maxDepth,
    timeBudgetMs: vars.ENDGAME_TIME_BUDGET_MS ?? DEFAULT_ENDGAME_AI_CONFIG.timeBudgetMs,
    profile: vars.ENDGAME_PROFILE ?? DEFAULT_ENDGAME_AI_CONFIG.profile,
    useTranspositionCache: capacity === undefined ? DEFAULT_ENDGAME_AI_CONFIG.useTranspositionCache : capacity > 0,
    cacheCapacity: capacity && capacity > 0 ? capacity : DEFAULT_ENDGAME_AI_CONFIG.cacheCapacity,
    verbose: vars.ENDGAME_VERBOSE ?? DEFAULT_ENDGAME_AI_CONFIG.verbose,
  };
}
