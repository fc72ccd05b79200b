import logger from './logger';
import type { HealthStatus, ServiceStatus } from './types';

export interface ServiceState {
  name: string;
  status: ServiceStatus;
  health: HealthStatus;
  /** Whether the process was launched at least once in this deployment. */
  launched: boolean;
  restartCount: number;
  lastExitCode: number | null;
  startedAt: number | null;
  blockedOn: string[];
  failure: string | null;
  stopRequested: boolean;
}

export interface DeploymentState {
  project: string;
  version: number;
  services: Record<string, ServiceState>;
}

export type DeploymentAction =
  | { type: 'service.blocked'; service: string; waitingOn: string[] }
  | { type: 'service.starting'; service: string; restart: boolean }
  | { type: 'service.launched'; service: string; at: number; probed: boolean }
  | { type: 'service.health'; service: string; health: HealthStatus }
  | { type: 'service.exited'; service: string; exitCode: number }
  | { type: 'service.restart-scheduled'; service: string; delayMs: number }
  | { type: 'service.failed'; service: string; reason: string }
  | { type: 'service.stop-requested'; service: string }
  | { type: 'service.stopped'; service: string };

export type StateListener = (state: DeploymentState, action: DeploymentAction, previous: DeploymentState) => void;

const initialService = (name: string): ServiceState => ({
  name,
  status: 'pending',
  health: 'none',
  launched: false,
  restartCount: 0,
  lastExitCode: null,
  startedAt: null,
  blockedOn: [],
  failure: null,
  stopRequested: false,
});

export const createInitialState = (project: string, services: string[]): DeploymentState => ({
  project,
  version: 0,
  services: Object.fromEntries(services.map((name) => [name, initialService(name)])),
});

const patch = (state: ServiceState, action: DeploymentAction): ServiceState => {
  switch (action.type) {
    case 'service.blocked':
      return { ...state, status: 'blocked', blockedOn: action.waitingOn };
    case 'service.starting':
      return {
        ...state,
        status: 'starting',
        blockedOn: [],
        failure: null,
        stopRequested: false,
        restartCount: action.restart ? state.restartCount + 1 : state.restartCount,
      };
    case 'service.launched':
      return {
        ...state,
        status: 'running',
        launched: true,
        startedAt: action.at,
        health: action.probed ? 'starting' : 'none',
      };
    case 'service.health':
      return { ...state, health: action.health };
    case 'service.exited':
      // Health belongs to the process that just ended.
      return { ...state, status: 'exited', health: 'none', lastExitCode: action.exitCode };
    case 'service.restart-scheduled':
      return { ...state, status: 'restarting' };
    case 'service.failed':
      return { ...state, status: 'failed', failure: action.reason };
    case 'service.stop-requested':
      return { ...state, stopRequested: true };
    case 'service.stopped':
      return { ...state, status: 'stopped', blockedOn: [] };
  }
};

/**
 * Pure reducer. Actions for unknown services leave the state untouched.
 */
export const reduceDeployment = (state: DeploymentState, action: DeploymentAction): DeploymentState => {
  const current = state.services[action.service];
  if (current === undefined) return state;

  return {
    ...state,
    version: state.version + 1,
    services: { ...state.services, [action.service]: patch(current, action) },
  };
};

/**
 * Orchestrator-owned deployment state.
 *
 * Changes only through `dispatch`. Actions dispatched from inside a listener
 * are queued and applied after the current notification round, so listeners
 * always observe transitions one at a time and in order.
 */
export class DeploymentStore {
  private state: DeploymentState;
  private readonly listeners = new Set<StateListener>();
  private readonly queue: DeploymentAction[] = [];
  private dispatching = false;

  constructor(project: string, services: string[]) {
    this.state = createInitialState(project, services);
  }

  getState(): DeploymentState {
    return this.state;
  }

  getService(name: string): ServiceState | undefined {
    return this.state.services[name];
  }

  subscribe(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  dispatch(action: DeploymentAction): void {
    this.queue.push(action);
    if (this.dispatching) return;

    this.dispatching = true;
    try {
      let next = this.queue.shift();
      while (next !== undefined) {
        const previous = this.state;
        this.state = reduceDeployment(previous, next);
        if (this.state !== previous) {
          this.notify(next, previous);
        }
        next = this.queue.shift();
      }
    } finally {
      this.dispatching = false;
    }
  }

  private notify(action: DeploymentAction, previous: DeploymentState): void {
    for (const listener of this.listeners) {
      try {
        listener(this.state, action, previous);
      } catch (err) {
        logger.error({ err, action: action.type, service: action.service }, 'State listener failed');
      }
    }
  }
}
