import { ProbeFailureError, ProbeTimeoutError, toError } from './errors';
import type { HealthProbe, ProbeCommand } from './types';

/**
 * Runs one check command. Resolves with the exit code; must stop work when
 * `signal` aborts.
 */
export type ProbeExecutor = (command: ProbeCommand, signal: AbortSignal) => Promise<number>;

export type ProbeOutcome =
  | { ok: true }
  | { ok: false; error: Error };

type Settled = { kind: 'exit'; code: number } | { kind: 'error'; error: Error } | { kind: 'timeout' };

/**
 * Run a single probe attempt, whichever comes first: the check's exit or its
 * timeout. A timed-out check is aborted.
 */
export const runProbe = async (
  service: string,
  probe: HealthProbe,
  exec: ProbeExecutor
): Promise<ProbeOutcome> => {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<Settled>((resolve) => {
    timer = setTimeout(() => resolve({ kind: 'timeout' }), probe.timeoutMs);
  });

  const running = exec(probe.test, controller.signal).then(
    (code): Settled => ({ kind: 'exit', code }),
    (error: unknown): Settled => ({ kind: 'error', error: toError(error) })
  );

  try {
    const settled = await Promise.race([running, timeout]);
    switch (settled.kind) {
      case 'timeout':
        controller.abort();
        return { ok: false, error: new ProbeTimeoutError(service, probe.timeoutMs) };
      case 'error':
        return { ok: false, error: settled.error };
      case 'exit':
        return settled.code === 0
          ? { ok: true }
          : { ok: false, error: new ProbeFailureError(service, settled.code) };
    }
  } finally {
    clearTimeout(timer);
  }
};
