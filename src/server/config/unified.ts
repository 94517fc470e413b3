/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a
 * frozen config object that all server code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import type { AIConfig } from '../../shared/types/game';
import {
  AIStrategySchema,
  EvaluationKindSchema,
  LogFormatSchema,
  LogLevelSchema,
  MAX_AI_DEPTH,
  NodeEnvSchema,
  RawEnv,
  getEffectiveNodeEnv,
  isProduction,
  isTest,
  parseEnv,
} from './env';

// Load .env into process.env before we read anything from it.
// Skipped in test mode so a developer's .env cannot override test settings.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const envResult = parseEnv(process.env);
if (!envResult.success) {
  console.error('❌ Invalid environment configuration:');
  for (const error of envResult.errors ?? []) {
    console.error(`  - ${error.path || 'root'}: ${error.message}`);
  }
  process.exit(1);
}
const env: RawEnv =
  envResult.data ??
  (() => {
    throw new Error('Missing env data after successful parse');
  })();

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isProduction: z.boolean(),
  isTest: z.boolean(),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
  ai: z.object({
    strategy: AIStrategySchema,
    depth: z.number().int().min(1).max(MAX_AI_DEPTH),
    evaluation: EvaluationKindSchema,
    noise: z.number().int().min(0),
    pruning: z.boolean(),
    thinkTimeMs: z.number().int().positive().optional(),
    seed: z.number().int().min(0).optional(),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Assemble the application config from an already-validated environment.
 * Exported so tests can build configs from controlled inputs.
 */
export function buildConfig(rawEnv: RawEnv): AppConfig {
  const nodeEnv = getEffectiveNodeEnv(rawEnv);
  return ConfigSchema.parse({
    nodeEnv,
    isProduction: isProduction(nodeEnv),
    isTest: isTest(nodeEnv),
    logging: {
      level: rawEnv.LOG_LEVEL,
      format: rawEnv.LOG_FORMAT,
      file: rawEnv.LOG_FILE?.trim() || undefined,
    },
    ai: {
      strategy: rawEnv.REVERSI_AI_STRATEGY,
      depth: rawEnv.REVERSI_AI_DEPTH,
      evaluation: rawEnv.REVERSI_AI_EVALUATION,
      noise: rawEnv.REVERSI_AI_NOISE,
      pruning: rawEnv.REVERSI_AI_PRUNING,
      thinkTimeMs: rawEnv.REVERSI_AI_THINK_TIME_MS,
      seed: rawEnv.REVERSI_AI_SEED,
    },
  });
}

/** AI settings from config, in the shape the engine consumes. */
export function defaultAIConfig(appConfig: AppConfig): AIConfig {
  const { strategy, depth, evaluation, noise, pruning, thinkTimeMs } = appConfig.ai;
  return { strategy, depth, evaluation, noise, pruning, thinkTimeMs };
}

// Parse and freeze the final config so downstream code gets a fully
// validated, immutable view.
export const config: AppConfig = Object.freeze(buildConfig(env));
