import { EventEmitter } from 'node:events';
import logger, { serviceLogger } from './logger';
import { DependencyGate } from './dependency-gate';
import {
  CancelledError,
  ProcessExitedError,
  StackgateError,
  UnhealthyError,
  UnknownServiceError,
  toError,
} from './errors';
import { resolveStartOrder, transitiveDependents } from './graph';
import { HealthMonitor } from './health-monitor';
import type { HealthTransition } from './health-monitor';
import { DEFAULT_BACKOFF, RestartPolicyEnforcer } from './restart-policy';
import type { BackoffOptions } from './restart-policy';
import type { ContainerRuntime, RunningContainer } from './runtime';
import { DeploymentStore } from './store';
import type { DeploymentAction, DeploymentState, ServiceState } from './store';
import { TimerQueue } from './timer-queue';
import type { Deployment, HealthStatus } from './types';

/**
 * Configuration for createOrchestrator.
 *
 * runtime: Boundary that actually runs containers and health checks.
 * backoff: Restart backoff; merged over the defaults.
 * dependencyTimeoutMs: Fail a blocked start after this long. Unset waits forever.
 * timers: Shared timer queue, mostly useful to tests.
 */
export interface OrchestratorConfig {
  deployment: Deployment;
  runtime: ContainerRuntime;
  backoff?: Partial<BackoffOptions>;
  dependencyTimeoutMs?: number;
  timers?: TimerQueue;
}

export interface DownOptions {
  /** Also remove named volumes. */
  volumes?: boolean;
}

/**
 * Snapshot served by the status endpoint and the CLI.
 */
export interface StatusSnapshot {
  project: string;
  healthy: boolean;
  timestamp: number;
  batches: string[][] | null;
  services: Record<string, ServiceState>;
}

export interface OrchestratorEvents {
  state: [state: DeploymentState, action: DeploymentAction];
  started: [service: string];
  health: [service: string, health: HealthStatus];
  blocked: [service: string, waitingOn: string[]];
  'dependency-failed': [service: string, error: StackgateError];
  'restart-scheduled': [service: string, delayMs: number, attempt: number];
  exited: [service: string, exitCode: number];
  failure: [service: string, error: Error];
  ready: [];
  done: [];
}

export type OrchestratorEvent = keyof OrchestratorEvents;

export interface OrchestratorInstance {
  /** Resolve the start order, prepare networks and volumes, launch every service. */
  up(): Promise<string[][]>;
  /** Operator stop: no restart, pending dependents are cancelled. */
  stop(service: string): Promise<void>;
  down(options?: DownOptions): Promise<void>;
  getStatus(): StatusSnapshot;
  on<E extends OrchestratorEvent>(event: E, listener: (...args: OrchestratorEvents[E]) => void): OrchestratorInstance;
  emit<E extends OrchestratorEvent>(event: E, ...args: OrchestratorEvents[E]): boolean;
}

/**
 * Every service is running and every probed service reports healthy.
 */
export const isDeploymentHealthy = (services: Record<string, ServiceState>): boolean =>
  Object.values(services).every(
    (service) => service.status === 'running' && (service.health === 'none' || service.health === 'healthy')
  );

/**
 * Create the supervisor for one deployment.
 *
 * Start order comes from the dependency graph; each service then waits on its
 * own gate (`started` dependencies launched, `healthy` dependencies probed
 * healthy) and launches as soon as it opens. Process exits go through the
 * restart policy. All per-service state lives in a single store.
 *
 * @example
 * const orchestrator = createOrchestrator({
 *   deployment: await loadManifest('docker-compose.yaml'),
 *   runtime: new DockerRuntime({ project: 'shop' }),
 * });
 *
 * orchestrator.on('health', (service, health) => console.log(service, health));
 * await orchestrator.up();
 */
export const createOrchestrator = (config: OrchestratorConfig): OrchestratorInstance => {
  const { deployment, runtime } = config;
  const { services } = deployment;
  const emitter = new EventEmitter();
  const timers = config.timers ?? new TimerQueue();
  const store = new DeploymentStore(deployment.project, Object.keys(services));
  const enforcer = new RestartPolicyEnforcer({ ...DEFAULT_BACKOFF, ...config.backoff });

  const containers = new Map<string, RunningContainer>();
  const monitors = new Map<string, HealthMonitor>();
  const pendingStarts = new Map<string, AbortController>();
  let batches: string[][] | null = null;
  let readyEmitted = false;

  const gate = new DependencyGate({
    store,
    timers,
    timeoutMs: config.dependencyTimeoutMs,
    onDependencyFailed: (service, dependency, state) => {
      const error =
        state.health === 'unhealthy'
          ? new UnhealthyError(dependency.service, services[dependency.service].healthcheck?.retries ?? 0)
          : new ProcessExitedError(dependency.service, state.lastExitCode ?? 1);
      serviceLogger(service).error({ err: error, dependency: dependency.service }, 'Dependency failed');
      emitter.emit('dependency-failed', service, error);
    },
  });

  store.subscribe((state, action) => {
    emitter.emit('state', state, action);
    if (action.type === 'service.blocked') {
      emitter.emit('blocked', action.service, action.waitingOn);
    }
  });

  const checkReady = () => {
    if (readyEmitted) return;
    const all = Object.values(store.getState().services);
    if (all.every((service) => service.launched)) {
      readyEmitted = true;
      logger.info({ project: deployment.project }, 'All services launched');
      emitter.emit('ready');
    }
  };

  const stopMonitor = (name: string) => {
    monitors.get(name)?.stop();
    monitors.delete(name);
  };

  const startMonitor = (name: string) => {
    const spec = services[name];
    const probe = spec.healthcheck;
    if (probe === undefined) return;

    const monitor = new HealthMonitor({
      service: name,
      probe,
      timers,
      exec: (command, signal) => runtime.exec(spec, command, signal),
      onTransition: ({ to }: HealthTransition) => {
        store.dispatch({ type: 'service.health', service: name, health: to });
        emitter.emit('health', name, to);
      },
    });
    monitors.set(name, monitor);
    monitor.start();
  };

  const fail = (name: string, error: Error) => {
    store.dispatch({ type: 'service.failed', service: name, reason: error.message });
    emitter.emit('failure', name, error);
  };

  const handleExit = (name: string, exitCode: number, startedAt: number) => {
    const log = serviceLogger(name);
    containers.delete(name);
    stopMonitor(name);

    store.dispatch({ type: 'service.exited', service: name, exitCode });
    emitter.emit('exited', name, exitCode);

    const state = store.getService(name);
    const decision = enforcer.onExit(services[name], {
      exitCode,
      stopRequested: state?.stopRequested ?? false,
      uptimeMs: Date.now() - startedAt,
    });

    if (!decision.restart) {
      log.info({ exitCode, reason: decision.reason }, 'Service will not be restarted');
      if (decision.reason === 'stopped') {
        store.dispatch({ type: 'service.stopped', service: name });
      } else if (exitCode !== 0) {
        fail(name, new ProcessExitedError(name, exitCode));
      }
      return;
    }

    log.warn({ exitCode, delayMs: decision.delayMs, attempt: decision.attempt }, 'Restart scheduled');
    store.dispatch({ type: 'service.restart-scheduled', service: name, delayMs: decision.delayMs });
    emitter.emit('restart-scheduled', name, decision.delayMs, decision.attempt);

    timers.schedule(name, decision.delayMs, () => {
      launch(name, true).catch((err) => {
        log.error({ err }, 'Restart failed');
      });
    });
  };

  const launch = async (name: string, restart: boolean): Promise<void> => {
    const spec = services[name];
    const log = serviceLogger(name);

    store.dispatch({ type: 'service.starting', service: name, restart });

    let container: RunningContainer;
    try {
      container = await runtime.start(spec);
    } catch (err) {
      log.error({ err }, 'Container failed to start');
      handleExit(name, 1, Date.now());
      return;
    }

    const startedAt = Date.now();
    containers.set(name, container);
    store.dispatch({ type: 'service.launched', service: name, at: startedAt, probed: spec.healthcheck !== undefined });
    log.info({ container: container.id, restart }, 'Service started');
    emitter.emit('started', name);

    startMonitor(name);
    checkReady();

    container.exited
      .then(
        (code) => handleExit(name, code, startedAt),
        (err) => {
          log.error({ err }, 'Lost track of container process');
          handleExit(name, 1, startedAt);
        }
      )
      .catch((err) => {
        log.error({ err }, 'Exit handling failed');
      });

    if (store.getService(name)?.stopRequested) {
      await runtime.stop(spec);
    }
  };

  const schedule = async (name: string): Promise<void> => {
    const controller = new AbortController();
    pendingStarts.set(name, controller);

    try {
      await gate.waitFor(name, services[name].dependsOn, controller.signal);
    } catch (err) {
      if (err instanceof CancelledError) {
        store.dispatch({ type: 'service.stopped', service: name });
      } else {
        serviceLogger(name).error({ err }, 'Gave up waiting for dependencies');
        fail(name, toError(err));
      }
      return;
    } finally {
      pendingStarts.delete(name);
    }

    await launch(name, false);
  };

  const up = async (): Promise<string[][]> => {
    // Resolver errors abort here, before anything is created.
    const order = resolveStartOrder(services);
    batches = order;
    logger.info({ project: deployment.project, batches: order }, 'Start order resolved');

    for (const network of Object.values(deployment.networks)) {
      await runtime.ensureNetwork(network);
    }
    for (const volume of Object.values(deployment.volumes)) {
      await runtime.ensureVolume(volume);
    }

    for (const batch of order) {
      for (const name of batch) {
        schedule(name).catch((err) => {
          serviceLogger(name).error({ err }, 'Service task failed');
          fail(name, toError(err));
        });
      }
    }

    return order;
  };

  const stop = async (name: string): Promise<void> => {
    if (!Object.hasOwn(services, name)) {
      throw new UnknownServiceError(name);
    }
    const spec = services[name];

    const log = serviceLogger(name);
    log.info('Stop requested');
    store.dispatch({ type: 'service.stop-requested', service: name });
    enforcer.reset(name);

    for (const target of [name, ...transitiveDependents(services, name)]) {
      if (target !== name && store.getService(target)?.launched) continue;
      timers.cancelOwner(target);
      pendingStarts.get(target)?.abort();
    }
    stopMonitor(name);

    if (containers.has(name)) {
      await runtime.stop(spec);
      return;
    }

    const status = store.getService(name)?.status;
    if (status !== 'starting') {
      store.dispatch({ type: 'service.stopped', service: name });
    }
  };

  const waitForExit = (name: string): Promise<void> => {
    const container = containers.get(name);
    if (container === undefined) return Promise.resolve();
    return container.exited.then(
      () => undefined,
      () => undefined
    );
  };

  const down = async (options: DownOptions = {}): Promise<void> => {
    logger.info({ project: deployment.project, volumes: options.volumes ?? false }, 'Tearing down deployment');
    const order = batches ?? resolveStartOrder(services);

    for (const batch of [...order].reverse()) {
      await Promise.all(
        batch.map(async (name) => {
          const tracked = containers.has(name);
          const running = waitForExit(name);
          await stop(name);
          // A container left behind by an earlier run is not tracked here.
          if (!tracked) await runtime.stop(services[name]);
          await running;
          await runtime.remove(services[name]);
        })
      );
    }

    timers.clear();

    for (const network of Object.values(deployment.networks)) {
      await runtime.removeNetwork(network);
    }
    if (options.volumes) {
      for (const volume of Object.values(deployment.volumes)) {
        await runtime.removeVolume(volume);
      }
    }

    emitter.emit('done');
  };

  const getStatus = (): StatusSnapshot => {
    const state = store.getState();
    return {
      project: state.project,
      healthy: isDeploymentHealthy(state.services),
      timestamp: Date.now(),
      batches,
      services: state.services,
    };
  };

  const instance: OrchestratorInstance = {
    up,
    stop,
    down,
    getStatus,
    on: (event, listener) => {
      emitter.on(event, listener);
      return instance;
    },
    emit: (event, ...args) => emitter.emit(event, ...args),
  };

  return instance;
};
