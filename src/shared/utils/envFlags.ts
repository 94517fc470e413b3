// Shared helpers for reading environment flags. Keeping this logic
// centralised means config, logging and tests agree on what counts as
// "enabled" and on when we are running under Jest.

type ProcessEnv = Record<string, string | undefined>;
function getProcessEnv(): ProcessEnv | undefined {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return undefined;
}

export function readEnv(name: string): string | undefined {
  const env = getProcessEnv();
  if (env) {
    const value = env[name];
    if (typeof value === 'string') {
      return value;
    }
  }

  return undefined;
}

/**
 * Returns true if running inside a Jest worker process, even when
 * NODE_ENV was set to something else (for example by a .env file).
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}

export function parseFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === '') return undefined;
  return raw === '1' || raw.toLowerCase() === 'true';
}

export function flagEnabled(name: string): boolean {
  return parseFlag(readEnv(name)) ?? false;
}

/**
 * Trace every AI decision at debug level with the board dump attached.
 * Set REVERSI_AI_TRACE=1 to enable.
 */
export function isAITraceEnabled(): boolean {
  return flagEnabled('REVERSI_AI_TRACE');
}
