// Shared helpers for reading environment flags from engine code. The engine
// does not depend on the server config layer, so it reads process.env
// directly through these helpers.

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
 * Returns true if running in a test environment (NODE_ENV === 'test').
 */
export function isTestEnvironment(): boolean {
  return readEnv('NODE_ENV') === 'test';
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * is configured differently.
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}

export function flagEnabled(name: string): boolean {
  const raw = readEnv(name);
  if (!raw) return false;
  return raw === '1' || raw === 'true' || raw === 'TRUE';
}

/**
 * Board invariants are checked after every executed move under tests and
 * when ENGINE_ASSERT_INVARIANTS is set. Off by default in production: the
 * check walks the whole board on every ply.
 */
export function isInvariantCheckingEnabled(): boolean {
  return isTestEnvironment() || isJestRuntime() || flagEnabled('ENGINE_ASSERT_INVARIANTS');
}
