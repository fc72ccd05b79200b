import { parseDuration } from './duration';
import { ConfigError } from './errors';
import { DEFAULT_MANIFEST } from './manifest';
import { DEFAULT_BACKOFF } from './restart-policy';
import type { BackoffOptions } from './restart-policy';

export const DEFAULT_STATUS_PORT = 3000;

export interface StackgateConfig {
  file: string;
  project?: string;
  statusPort: number;
  /** Unset means a blocked dependent waits forever. */
  dependencyTimeoutMs?: number;
  backoff: BackoffOptions;
}

const durationVar = (env: NodeJS.ProcessEnv, key: string): number | undefined => {
  const raw = env[key];
  if (raw === undefined || raw === '') return undefined;
  const ms = parseDuration(raw);
  if (ms === undefined) {
    throw new ConfigError(`${key} must be a duration such as 30s or 2m, got "${raw}"`);
  }
  return ms;
};

const portVar = (env: NodeJS.ProcessEnv, key: string, fallback: number): number => {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`${key} must be a port number, got "${raw}"`);
  }
  return port;
};

/**
 * Read settings from the environment. CLI flags are applied on top by the
 * caller.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): StackgateConfig => ({
  file: env.STACKGATE_FILE || DEFAULT_MANIFEST,
  project: env.STACKGATE_PROJECT || undefined,
  statusPort: portVar(env, 'STACKGATE_STATUS_PORT', DEFAULT_STATUS_PORT),
  dependencyTimeoutMs: durationVar(env, 'STACKGATE_DEPENDENCY_TIMEOUT'),
  backoff: {
    ...DEFAULT_BACKOFF,
    initialDelayMs: durationVar(env, 'STACKGATE_BACKOFF_INITIAL') ?? DEFAULT_BACKOFF.initialDelayMs,
    maxDelayMs: durationVar(env, 'STACKGATE_BACKOFF_MAX') ?? DEFAULT_BACKOFF.maxDelayMs,
  },
});
