/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables,
 * validates them at startup, and exports a typed env object.
 */

import { z } from 'zod';
import { isJestRuntime, parseFlag } from '../../shared/utils/envFlags';

export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

export const AIStrategySchema = z.enum(['random', 'negamax']);

export const EvaluationKindSchema = z.enum(['material', 'positional']);

/** Deepest search a configuration may request. */
export const MAX_AI_DEPTH = 8;

const booleanFlag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) => parseFlag(val) ?? defaultValue);

/**
 * Complete environment variable schema with validation rules and defaults.
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  // ===================================================================
  // LOGGING
  // ===================================================================

  LOG_LEVEL: LogLevelSchema.default('info'),

  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Optional file that receives JSON logs in addition to the console */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // AI PLAYER DEFAULTS
  // ===================================================================

  REVERSI_AI_STRATEGY: AIStrategySchema.default('negamax'),

  /** Plies searched by negamax */
  REVERSI_AI_DEPTH: z.coerce.number().int().min(1).max(MAX_AI_DEPTH).default(4),

  REVERSI_AI_EVALUATION: EvaluationKindSchema.default('positional'),

  /** Leaf noise amplitude; 0 keeps the AI deterministic */
  REVERSI_AI_NOISE: z.coerce.number().int().min(0).max(1000).default(0),

  /** Alpha-beta pruning (does not change the chosen move) */
  REVERSI_AI_PRUNING: booleanFlag(true),

  /** Optional wall-clock budget per AI move (milliseconds) */
  REVERSI_AI_THINK_TIME_MS: z.coerce.number().int().positive().optional(),

  /** Base seed for AI randomness; a fresh seed is drawn when unset */
  REVERSI_AI_SEED: z.coerce.number().int().min(0).optional(),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Determine effective node environment.
 *
 * When running under Jest, always treats the environment as 'test'
 * regardless of NODE_ENV.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

export function isProduction(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'production';
}

export function isTest(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'test';
}
