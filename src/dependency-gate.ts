import { CancelledError, DependencyTimeoutError } from './errors';
import type { DeploymentStore, ServiceState } from './store';
import type { TimerHandle, TimerQueue } from './timer-queue';
import type { Dependency } from './types';

export interface DependencyGateOptions {
  store: DeploymentStore;
  timers: TimerQueue;
  /** Give up waiting after this long. Waits forever when unset. */
  timeoutMs?: number;
  /** A dependency the service waits on will not become ready on its own. */
  onDependencyFailed?: (service: string, dependency: Dependency, state: ServiceState) => void;
}

/**
 * `started` is met once the dependency's process has been launched;
 * `healthy` only while its process runs and its probe reports healthy.
 */
export const isConditionMet = (dependency: Dependency, state: ServiceState | undefined): boolean => {
  if (state === undefined) return false;
  if (dependency.condition === 'started') return state.launched;
  return state.status === 'running' && state.health === 'healthy';
};

const sameMembers = (a: string[], b: string[]): boolean =>
  a.length === b.length && a.every((name, i) => name === b[i]);

/**
 * Blocks a pending start until every dependency condition holds.
 *
 * The wait is driven by store transitions. An unhealthy or failed dependency
 * is reported through `onDependencyFailed` but does not end the wait: a
 * restart may still make the dependency healthy.
 */
export class DependencyGate {
  constructor(private readonly options: DependencyGateOptions) {}

  pending(dependencies: Dependency[]): string[] {
    const { store } = this.options;
    return dependencies
      .filter((dependency) => !isConditionMet(dependency, store.getService(dependency.service)))
      .map((dependency) => dependency.service);
  }

  waitFor(service: string, dependencies: Dependency[], signal: AbortSignal): Promise<void> {
    const { store, timers, timeoutMs, onDependencyFailed } = this.options;

    return new Promise<void>((resolve, reject) => {
      if (signal.aborted) {
        reject(new CancelledError(service));
        return;
      }

      let waitingOn = this.pending(dependencies);
      if (waitingOn.length === 0) {
        resolve();
        return;
      }

      let timeout: TimerHandle | null = null;

      const cleanup = () => {
        unsubscribe();
        timeout?.cancel();
        signal.removeEventListener('abort', onAbort);
      };

      const onAbort = () => {
        cleanup();
        reject(new CancelledError(service));
      };

      const unsubscribe = store.subscribe((state, action) => {
        if (action.service === service) return;

        const dependency = dependencies.find((candidate) => candidate.service === action.service);
        if (dependency === undefined) return;

        const current = this.pending(dependencies);
        if (current.length === 0) {
          cleanup();
          resolve();
          return;
        }

        const depState = state.services[action.service];
        const failed =
          (action.type === 'service.health' && action.health === 'unhealthy') || action.type === 'service.failed';
        if (failed && depState !== undefined) {
          onDependencyFailed?.(service, dependency, depState);
        }

        if (!sameMembers(current, waitingOn)) {
          waitingOn = current;
          store.dispatch({ type: 'service.blocked', service, waitingOn });
        }
      });

      signal.addEventListener('abort', onAbort, { once: true });

      if (timeoutMs !== undefined) {
        timeout = timers.schedule(service, timeoutMs, () => {
          cleanup();
          reject(new DependencyTimeoutError(service, this.pending(dependencies), timeoutMs));
        });
      }

      store.dispatch({ type: 'service.blocked', service, waitingOn });

      for (const dependency of dependencies) {
        const depState = store.getService(dependency.service);
        if (depState === undefined || !waitingOn.includes(dependency.service)) continue;
        if (depState.health === 'unhealthy' || depState.status === 'failed') {
          onDependencyFailed?.(service, dependency, depState);
        }
      }
    });
  }
}
