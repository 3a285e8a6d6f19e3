/**
 * Runtime configuration
 * Environment overrides for the tuning constants, validated with zod
 */

import { z } from 'zod';
import {
  CYCLE_DELAY_MS,
  DEFAULT_PORT,
  LOOKAHEAD_DEPTH,
  MAX_CYCLES,
  MAX_STUCK_CYCLES,
  PIVOT_THRESHOLD,
  SNAKE_WEIGHT_BASE,
  TILE_WEIGHT_BASE
} from './game/constants.js';
import type { EvaluationWeights } from './game/types.js';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const flag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform(value => value === 'true' || value === '1');

const EnvSchema = z.object({
  PORT: positiveInt(DEFAULT_PORT),
  LOOKAHEAD_DEPTH: positiveInt(LOOKAHEAD_DEPTH),
  PIVOT_THRESHOLD: positiveInt(PIVOT_THRESHOLD),
  SNAKE_WEIGHT_BASE: z.coerce.number().positive().default(SNAKE_WEIGHT_BASE),
  TILE_WEIGHT_BASE: z.coerce.number().positive().default(TILE_WEIGHT_BASE),
  MAX_CYCLES: positiveInt(MAX_CYCLES),
  MAX_STUCK_CYCLES: positiveInt(MAX_STUCK_CYCLES),
  CYCLE_DELAY_MS: z.coerce.number().int().nonnegative().default(CYCLE_DELAY_MS),
  DISABLE_LOGGING: flag
});

export type EngineConfig = {
  port: number;
  lookaheadDepth: number;
  pivotThreshold: number;
  weights: EvaluationWeights;
  maxCycles: number;
  maxStuckCycles: number;
  cycleDelayMs: number;
  loggingEnabled: boolean;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration - ${details}`);
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    lookaheadDepth: parsed.LOOKAHEAD_DEPTH,
    pivotThreshold: parsed.PIVOT_THRESHOLD,
    weights: {
      snakeBase: parsed.SNAKE_WEIGHT_BASE,
      tileBase: parsed.TILE_WEIGHT_BASE
    },
    maxCycles: parsed.MAX_CYCLES,
    maxStuckCycles: parsed.MAX_STUCK_CYCLES,
    cycleDelayMs: parsed.CYCLE_DELAY_MS,
    loggingEnabled: !parsed.DISABLE_LOGGING
  };
}
