import type { ServiceSpec } from './types';

export interface BackoffOptions {
  initialDelayMs: number;
  /** Ceiling for a single delay. */
  maxDelayMs: number;
  multiplier: number;
  /** A process that stayed up this long resets the consecutive-failure count. */
  resetAfterMs: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  initialDelayMs: 100,
  maxDelayMs: 60_000,
  multiplier: 2,
  resetAfterMs: 10_000,
};

export interface ExitContext {
  exitCode: number;
  stopRequested: boolean;
  uptimeMs: number;
}

export type RestartDecision =
  | { restart: true; delayMs: number; attempt: number }
  | { restart: false; reason: 'stopped' | 'policy-never' | 'clean-exit' | 'max-restarts' };

/**
 * Delay before restart attempt `attempt` (1-based), capped at the ceiling.
 */
export const backoffDelay = (attempt: number, options: BackoffOptions = DEFAULT_BACKOFF): number =>
  Math.min(options.maxDelayMs, options.initialDelayMs * options.multiplier ** Math.max(0, attempt - 1));

interface RestartHistory {
  consecutive: number;
  restarts: number;
}

/**
 * Reacts to process exits per restart policy.
 *
 * Keeps per-service history: consecutive quick failures drive the backoff,
 * total restarts drive the `on-failure` cap. Every restart waits at least
 * the backoff delay, `always-unless-stopped` included, so a crash loop is
 * rate-limited.
 */
export class RestartPolicyEnforcer {
  private readonly history = new Map<string, RestartHistory>();

  constructor(private readonly backoff: BackoffOptions = DEFAULT_BACKOFF) {}

  onExit(spec: Pick<ServiceSpec, 'name' | 'restart' | 'maxRestarts'>, exit: ExitContext): RestartDecision {
    if (exit.stopRequested) return { restart: false, reason: 'stopped' };

    switch (spec.restart) {
      case 'never':
        return { restart: false, reason: 'policy-never' };
      case 'on-failure':
        if (exit.exitCode === 0) return { restart: false, reason: 'clean-exit' };
        break;
      case 'always-unless-stopped':
        break;
    }

    const history = this.history.get(spec.name) ?? { consecutive: 0, restarts: 0 };
    if (spec.restart === 'on-failure' && spec.maxRestarts !== undefined && history.restarts >= spec.maxRestarts) {
      return { restart: false, reason: 'max-restarts' };
    }

    const consecutive = exit.uptimeMs >= this.backoff.resetAfterMs ? 0 : history.consecutive;
    const attempt = consecutive + 1;
    this.history.set(spec.name, { consecutive: attempt, restarts: history.restarts + 1 });

    return { restart: true, delayMs: backoffDelay(attempt, this.backoff), attempt };
  }

  restarts(service: string): number {
    return this.history.get(service)?.restarts ?? 0;
  }

  /** Forget history, e.g. after an operator stop. */
  reset(service: string): void {
    this.history.delete(service);
  }
}
