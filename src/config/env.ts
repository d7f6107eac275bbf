/**
 * Game configuration read from environment variables.
 *
 * Every variable is optional; defaults reproduce the classic game
 * (8 guesses per round, 50 starting points, Fisher-Yates shuffle).
 * Validation collects every problem before failing.
 */

import { z } from 'zod';
import { SHUFFLE_STRATEGY_NAMES } from '../card-system/ShuffleStrategy';
import type { ShuffleStrategyName } from '../card-system/ShuffleStrategy';
import { LOG_FORMATS, LOG_LEVELS } from '../core-engine/Logger';
import type { LogFormat, LogLevel } from '../core-engine/Logger';

const positiveInt = (name: string) =>
  z
    .string()
    .regex(/^[1-9]\d*$/, `${name} must be a positive whole number`)
    .transform(Number);

const envSchema = z.object({
  HILO_ROUND_SIZE: positiveInt('HILO_ROUND_SIZE').optional(),
  HILO_STARTING_SCORE: positiveInt('HILO_STARTING_SCORE').optional(),
  HILO_SHUFFLE: z.enum(SHUFFLE_STRATEGY_NAMES).optional(),
  HILO_WEAK_SWAPS: z
    .string()
    .regex(/^\d+$/, 'HILO_WEAK_SWAPS must be a whole number')
    .transform(Number)
    .optional(),
  HILO_RESHUFFLE_ON_DRAW: z.enum(['true', 'false']).optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  LOG_FORMAT: z.enum(LOG_FORMATS).optional(),
});

/** Fully resolved game configuration. */
export interface GameConfig {
  /** Guesses allowed per round. */
  roundSize: number;
  startingScore: number;
  shuffle: ShuffleStrategyName;
  /** Swap count used when `shuffle` is `weak`. */
  weakSwaps: number;
  reshuffleOnDraw: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

export const DEFAULT_GAME_CONFIG: Readonly<GameConfig> = {
  roundSize: 8,
  startingScore: 50,
  shuffle: 'fisher-yates',
  weakSwaps: 10,
  reshuffleOnDraw: false,
  logLevel: 'info',
  logFormat: 'text',
};

/** Raised when one or more variables fail validation. */
export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Validate `env` and return the resolved configuration.
 *
 * @throws ConfigError listing every invalid variable.
 */
export function loadGameConfig(
  env: Record<string, string | undefined> = process.env,
): GameConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    );
  }

  const parsed = result.data;
  return {
    roundSize: parsed.HILO_ROUND_SIZE ?? DEFAULT_GAME_CONFIG.roundSize,
    startingScore: parsed.HILO_STARTING_SCORE ?? DEFAULT_GAME_CONFIG.startingScore,
    shuffle: parsed.HILO_SHUFFLE ?? DEFAULT_GAME_CONFIG.shuffle,
    weakSwaps: parsed.HILO_WEAK_SWAPS ?? DEFAULT_GAME_CONFIG.weakSwaps,
    reshuffleOnDraw: parsed.HILO_RESHUFFLE_ON_DRAW
      ? parsed.HILO_RESHUFFLE_ON_DRAW === 'true'
      : DEFAULT_GAME_CONFIG.reshuffleOnDraw,
    logLevel: parsed.LOG_LEVEL ?? DEFAULT_GAME_CONFIG.logLevel,
    logFormat: parsed.LOG_FORMAT ?? DEFAULT_GAME_CONFIG.logFormat,
  };
}

/** One-line summary of a configuration, for startup logging. */
export function describeConfig(config: GameConfig): string {
  return (
    `roundSize=${config.roundSize} startingScore=${config.startingScore} ` +
    `shuffle=${config.shuffle}` +
    (config.shuffle === 'weak' ? ` weakSwaps=${config.weakSwaps}` : '') +
    (config.reshuffleOnDraw ? ' reshuffleOnDraw' : '')
  );
}

