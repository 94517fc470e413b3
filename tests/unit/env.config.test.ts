/**
 * Environment Configuration Tests
 *
 * Tests for the Zod-based environment variable validation system:
 * - Defaults are applied when variables are missing
 * - String values are coerced to numbers and booleans
 * - Out-of-range and unknown values fail with the offending path
 */

import {
  getEffectiveNodeEnv,
  isProduction,
  isTest,
  parseEnv,
  type RawEnv,
} from '../../src/server/config/env';
import { buildConfig, defaultAIConfig } from '../../src/server/config/unified';

function parsedOrThrow(env: Record<string, string | undefined>): RawEnv {
  const result = parseEnv(env);
  if (!result.success || !result.data) {
    throw new Error(`Expected env to parse: ${JSON.stringify(result.errors)}`);
  }
  return result.data;
}

describe('EnvSchema', () => {
  describe('defaults', () => {
    it('fills every variable when the environment is empty', () => {
      const env = parsedOrThrow({});
      expect(env.NODE_ENV).toBe('development');
      expect(env.LOG_LEVEL).toBe('info');
      expect(env.LOG_FORMAT).toBe('pretty');
      expect(env.LOG_FILE).toBeUndefined();
      expect(env.REVERSI_AI_STRATEGY).toBe('negamax');
      expect(env.REVERSI_AI_DEPTH).toBe(4);
      expect(env.REVERSI_AI_EVALUATION).toBe('positional');
      expect(env.REVERSI_AI_NOISE).toBe(0);
      expect(env.REVERSI_AI_PRUNING).toBe(true);
      expect(env.REVERSI_AI_THINK_TIME_MS).toBeUndefined();
      expect(env.REVERSI_AI_SEED).toBeUndefined();
    });
  });

  describe('REVERSI_AI_DEPTH', () => {
    it('coerces numeric strings', () => {
      expect(parsedOrThrow({ REVERSI_AI_DEPTH: '6' }).REVERSI_AI_DEPTH).toBe(6);
    });

    it.each(['0', '9', '2.5', 'deep'])('rejects %p', (value) => {
      const result = parseEnv({ REVERSI_AI_DEPTH: value });
      expect(result.success).toBe(false);
      expect(result.errors?.some((e) => e.path === 'REVERSI_AI_DEPTH')).toBe(true);
    });
  });

  describe('REVERSI_AI_PRUNING', () => {
    const cases: Array<[string, boolean]> = [
      ['true', true],
      ['TRUE', true],
      ['1', true],
      ['false', false],
      ['0', false],
      ['off', false],
      ['', true],
    ];

    it.each(cases)('parses %p as %p', (value, expected) => {
      expect(parsedOrThrow({ REVERSI_AI_PRUNING: value }).REVERSI_AI_PRUNING).toBe(expected);
    });
  });

  describe('enums', () => {
    it('accepts the random strategy and material evaluation', () => {
      const env = parsedOrThrow({
        REVERSI_AI_STRATEGY: 'random',
        REVERSI_AI_EVALUATION: 'material',
      });
      expect(env.REVERSI_AI_STRATEGY).toBe('random');
      expect(env.REVERSI_AI_EVALUATION).toBe('material');
    });

    it('reports every invalid variable', () => {
      const result = parseEnv({
        NODE_ENV: 'staging',
        LOG_LEVEL: 'verbose',
        REVERSI_AI_STRATEGY: 'minimax',
      });
      expect(result.success).toBe(false);
      expect(result.errors?.map((e) => e.path).sort()).toEqual([
        'LOG_LEVEL',
        'NODE_ENV',
        'REVERSI_AI_STRATEGY',
      ]);
    });
  });

  describe('numeric options', () => {
    it('coerces noise, think time and seed', () => {
      const env = parsedOrThrow({
        REVERSI_AI_NOISE: '100',
        REVERSI_AI_THINK_TIME_MS: '250',
        REVERSI_AI_SEED: '42',
      });
      expect(env.REVERSI_AI_NOISE).toBe(100);
      expect(env.REVERSI_AI_THINK_TIME_MS).toBe(250);
      expect(env.REVERSI_AI_SEED).toBe(42);
    });

    it('rejects negative noise and a zero think time', () => {
      expect(parseEnv({ REVERSI_AI_NOISE: '-1' }).success).toBe(false);
      expect(parseEnv({ REVERSI_AI_THINK_TIME_MS: '0' }).success).toBe(false);
    });
  });
});

describe('node environment helpers', () => {
  const originalWorkerId = process.env.JEST_WORKER_ID;

  afterEach(() => {
    if (originalWorkerId === undefined) {
      delete process.env.JEST_WORKER_ID;
    } else {
      process.env.JEST_WORKER_ID = originalWorkerId;
    }
  });

  it('forces test mode inside a Jest worker', () => {
    process.env.JEST_WORKER_ID = '1';
    expect(getEffectiveNodeEnv(parsedOrThrow({ NODE_ENV: 'production' }))).toBe('test');
  });

  it('uses NODE_ENV outside Jest', () => {
    delete process.env.JEST_WORKER_ID;
    expect(getEffectiveNodeEnv(parsedOrThrow({ NODE_ENV: 'production' }))).toBe('production');
  });

  it('classifies environments', () => {
    expect(isProduction('production')).toBe(true);
    expect(isProduction('development')).toBe(false);
    expect(isTest('development')).toBe(false);
    expect(isTest('test')).toBe(true);
    expect(isProduction('test')).toBe(false);
  });
});

describe('buildConfig', () => {
  it('groups logging and AI settings', () => {
    const appConfig = buildConfig(
      parsedOrThrow({
        LOG_LEVEL: 'debug',
        LOG_FORMAT: 'json',
        LOG_FILE: '  ',
        REVERSI_AI_DEPTH: '3',
        REVERSI_AI_NOISE: '5',
        REVERSI_AI_PRUNING: 'false',
        REVERSI_AI_SEED: '9',
      })
    );
    expect(appConfig.logging).toEqual({ level: 'debug', format: 'json', file: undefined });
    expect(appConfig.ai).toEqual({
      strategy: 'negamax',
      depth: 3,
      evaluation: 'positional',
      noise: 5,
      pruning: false,
      thinkTimeMs: undefined,
      seed: 9,
    });
  });

  it('hands the AI defaults over without the seed', () => {
    const appConfig = buildConfig(parsedOrThrow({ REVERSI_AI_THINK_TIME_MS: '750' }));
    const aiConfig = defaultAIConfig(appConfig);
    expect(aiConfig).toEqual({
      strategy: 'negamax',
      depth: 4,
      evaluation: 'positional',
      noise: 0,
      pruning: true,
      thinkTimeMs: 750,
    });
    expect('seed' in aiConfig).toBe(false);
  });
});
