import { vi, describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ProcessExitedError, UnhealthyError, UnknownDependencyError, UnknownServiceError } from '../src/errors';
import { createOrchestrator, isDeploymentHealthy } from '../src/orchestrator';
import type { OrchestratorInstance } from '../src/orchestrator';
import { TimerQueue } from '../src/timer-queue';
import type { Deployment, ServiceSpec } from '../src/types';
import { FakeRuntime, flush } from './support/fake-runtime';
import { byName, dependsOn, probe, service } from './support/services';

const deploymentOf = (...specs: ServiceSpec[]): Deployment => ({
  project: 'shop',
  services: byName(...specs),
  networks: { default: { name: 'default', internal: false } },
  volumes: { data: { name: 'data', id: 'shop_data' } },
});

const threeTier = () =>
  deploymentOf(
    service('backend', { dependsOn: dependsOn(['db', 'healthy']) }),
    service('frontend', { dependsOn: dependsOn('backend') }),
    service('db', { healthcheck: probe({ retries: 10 }) })
  );

describe('createOrchestrator', () => {
  let runtime: FakeRuntime;
  let timers: TimerQueue;
  let events: string[];

  const tick = async (ms: number) => {
    await vi.advanceTimersByTimeAsync(ms);
    await flush();
  };

  const orchestrate = (deployment: Deployment, options: { dependencyTimeoutMs?: number } = {}): OrchestratorInstance => {
    const orchestrator = createOrchestrator({ deployment, runtime, timers, ...options });
    orchestrator
      .on('started', (name) => events.push(`started:${name}`))
      .on('health', (name, health) => events.push(`health:${name}:${health}`));
    return orchestrator;
  };

  beforeEach(() => {
    vi.useFakeTimers();
    runtime = new FakeRuntime();
    timers = new TimerQueue();
    events = [];
  });

  afterEach(() => {
    timers.clear();
    vi.useRealTimers();
  });

  describe('up', () => {
    it('should return the start batches and prepare networks and volumes', async () => {
      const orchestrator = orchestrate(threeTier());

      const batches = await orchestrator.up();

      expect(batches).toEqual([['db'], ['backend'], ['frontend']]);
      expect(runtime.networks).toEqual(['default']);
      expect(runtime.volumes).toEqual(['shop_data']);
    });

    it('should hold backend until db is healthy, then start frontend', async () => {
      const orchestrator = orchestrate(threeTier());
      const ready = vi.fn();
      orchestrator.on('ready', ready);

      await orchestrator.up();
      await flush();

      expect(runtime.started).toEqual(['db']);
      expect(orchestrator.getStatus().services.backend.status).toBe('blocked');
      expect(orchestrator.getStatus().services.backend.blockedOn).toEqual(['db']);
      expect(orchestrator.getStatus().services.frontend.blockedOn).toEqual(['backend']);

      await tick(9_999);
      expect(runtime.started).toEqual(['db']);

      await tick(1);

      expect(runtime.started).toEqual(['db', 'backend', 'frontend']);
      expect(events).toEqual([
        'started:db',
        'health:db:probing',
        'health:db:healthy',
        'started:backend',
        'started:frontend',
      ]);
      expect(ready).toHaveBeenCalledOnce();
    });

    it('should report a healthy snapshot once every service runs', async () => {
      const orchestrator = orchestrate(threeTier());

      await orchestrator.up();
      await tick(10_000);
      const status = orchestrator.getStatus();

      expect(status.project).toBe('shop');
      expect(status.healthy).toBe(true);
      expect(status.batches).toEqual([['db'], ['backend'], ['frontend']]);
      expect(status.services.db).toMatchObject({ status: 'running', health: 'healthy', launched: true });
    });

    it('should keep dependents blocked when db never becomes healthy', async () => {
      runtime.setProbe('db', () => 1);
      const orchestrator = orchestrate(threeTier());
      const failed = vi.fn();
      orchestrator.on('dependency-failed', failed);

      await orchestrator.up();
      await flush();
      for (let i = 0; i < 9; i++) {
        await tick(10_000);
      }
      expect(orchestrator.getStatus().services.db.health).toBe('probing');
      expect(failed).not.toHaveBeenCalled();

      await tick(10_000);
      const status = orchestrator.getStatus();

      expect(status.services.db.health).toBe('unhealthy');
      expect(status.services.backend.status).toBe('blocked');
      expect(status.services.frontend.status).toBe('blocked');
      expect(status.healthy).toBe(false);
      expect(runtime.started).toEqual(['db']);
      expect(runtime.probeCalls.get('db')).toBe(10);
      expect(failed).toHaveBeenCalledOnce();
      expect(failed.mock.calls[0][0]).toBe('backend');
      expect(failed.mock.calls[0][1]).toBeInstanceOf(UnhealthyError);
      expect(failed.mock.calls[0][1].message).toBe('Service "db" is unhealthy after 10 consecutive failed probes');
    });

    it('should reject before creating anything when a dependency is unknown', async () => {
      const orchestrator = orchestrate(deploymentOf(service('api', { dependsOn: dependsOn('db') })));

      await expect(orchestrator.up()).rejects.toThrow(UnknownDependencyError);
      expect(runtime.networks).toEqual([]);
      expect(runtime.started).toEqual([]);
    });

    it('should fail a blocked service after the dependency timeout', async () => {
      runtime.setProbe('db', () => 1);
      const orchestrator = orchestrate(threeTier(), { dependencyTimeoutMs: 30_000 });
      const failures: string[] = [];
      orchestrator.on('failure', (name, error) => failures.push(`${name}: ${error.message}`));

      await orchestrator.up();
      await flush();
      await tick(30_000);

      expect(failures).toEqual([
        'backend: Service "backend" still waiting on db after 30000ms',
        'frontend: Service "frontend" still waiting on backend after 30000ms',
      ]);
      expect(orchestrator.getStatus().services.backend.status).toBe('failed');
    });
  });

  describe('gating after a healthy dependency exits', () => {
    let queueCode: number;

    const gated = (db: Partial<ServiceSpec>) =>
      deploymentOf(
        service('db', { healthcheck: probe(), ...db }),
        service('queue', { healthcheck: probe({ retries: 10 }) }),
        service('backend', { dependsOn: dependsOn(['db', 'healthy'], ['queue', 'healthy']) })
      );

    const healthyDbThenExit = async (orchestrator: OrchestratorInstance) => {
      await orchestrator.up();
      await flush();
      await tick(10_000);
      expect(orchestrator.getStatus().services.db.health).toBe('healthy');
      expect(orchestrator.getStatus().services.backend.blockedOn).toEqual(['queue']);

      runtime.exit('db', 1);
      await flush();
      queueCode = 0;
    };

    beforeEach(() => {
      queueCode = 1;
      runtime.setProbe('queue', () => queueCode);
    });

    it('should make a restarted dependency pass health gating again', async () => {
      const orchestrator = orchestrate(gated({ restart: 'on-failure' }));

      await healthyDbThenExit(orchestrator);
      expect(orchestrator.getStatus().services.db).toMatchObject({ status: 'restarting', health: 'none' });
      expect(orchestrator.getStatus().services.backend.blockedOn).toEqual(['db', 'queue']);

      await tick(100);
      expect(runtime.started).toEqual(['db', 'queue', 'db']);
      expect(orchestrator.getStatus().services.db.health).toBe('starting');

      await tick(9_900);
      expect(orchestrator.getStatus().services.queue.health).toBe('healthy');
      expect(orchestrator.getStatus().services.backend.blockedOn).toEqual(['db']);
      expect(runtime.started).not.toContain('backend');

      await tick(100);
      expect(orchestrator.getStatus().services.db.health).toBe('healthy');
      expect(runtime.started).toEqual(['db', 'queue', 'db', 'backend']);
    });

    it('should keep the dependent blocked when the dependency exits for good', async () => {
      const orchestrator = orchestrate(gated({ restart: 'never' }));
      const failed = vi.fn();
      orchestrator.on('dependency-failed', failed);

      await healthyDbThenExit(orchestrator);
      await tick(10_000);
      const { services } = orchestrator.getStatus();

      expect(services.db).toMatchObject({ status: 'failed', health: 'none' });
      expect(services.queue.health).toBe('healthy');
      expect(services.backend).toMatchObject({ status: 'blocked', blockedOn: ['db'] });
      expect(runtime.started).toEqual(['db', 'queue']);
      expect(failed).toHaveBeenCalledOnce();
      expect(failed.mock.calls[0][1]).toBeInstanceOf(ProcessExitedError);
      expect(failed.mock.calls[0][1].message).toBe('Service "db" exited with code 1');
    });
  });

  describe('restarts', () => {
    it('should restart an on-failure service after the backoff delay', async () => {
      const orchestrator = orchestrate(deploymentOf(service('api', { restart: 'on-failure' })));
      const scheduled = vi.fn();
      orchestrator.on('restart-scheduled', scheduled);

      await orchestrator.up();
      await flush();
      runtime.exit('api', 1);
      await flush();

      expect(scheduled).toHaveBeenCalledWith('api', 100, 1);
      expect(orchestrator.getStatus().services.api.status).toBe('restarting');

      await tick(100);

      expect(runtime.started).toEqual(['api', 'api']);
      expect(orchestrator.getStatus().services.api).toMatchObject({
        status: 'running',
        restartCount: 1,
        lastExitCode: 1,
      });
    });

    it('should back off exponentially on repeated crashes', async () => {
      const orchestrator = orchestrate(deploymentOf(service('api', { restart: 'on-failure' })));
      const delays: number[] = [];
      orchestrator.on('restart-scheduled', (_name, delayMs) => delays.push(delayMs));

      await orchestrator.up();
      await flush();
      for (const delay of [100, 200, 400]) {
        runtime.exit('api', 1);
        await flush();
        await tick(delay);
      }

      expect(delays).toEqual([100, 200, 400]);
      expect(runtime.started).toHaveLength(4);
    });

    it('should fail a service with policy never that exits non-zero', async () => {
      const orchestrator = orchestrate(deploymentOf(service('job')));
      const failure = vi.fn();
      orchestrator.on('failure', failure);

      await orchestrator.up();
      await flush();
      runtime.exit('job', 3);
      await flush();

      expect(failure).toHaveBeenCalledOnce();
      expect(failure.mock.calls[0][1]).toBeInstanceOf(ProcessExitedError);
      expect(orchestrator.getStatus().services.job).toMatchObject({ status: 'failed', lastExitCode: 3 });
    });

    it('should leave a cleanly exited service exited', async () => {
      const orchestrator = orchestrate(deploymentOf(service('job', { restart: 'on-failure' })));

      await orchestrator.up();
      await flush();
      runtime.exit('job', 0);
      await tick(1_000);

      expect(runtime.started).toEqual(['job']);
      expect(orchestrator.getStatus().services.job.status).toBe('exited');
    });

    it('should retry a container that failed to start', async () => {
      runtime.failNextStart('api');
      const orchestrator = orchestrate(deploymentOf(service('api', { restart: 'on-failure' })));

      await orchestrator.up();
      await flush();
      expect(runtime.started).toEqual([]);

      await tick(100);

      expect(runtime.started).toEqual(['api']);
    });
  });

  describe('stop', () => {
    it('should stop a service without restarting it and cancel pending dependents', async () => {
      const orchestrator = orchestrate(
        deploymentOf(
          service('backend', { dependsOn: dependsOn(['db', 'healthy']) }),
          service('frontend', { dependsOn: dependsOn('backend') }),
          service('db', { restart: 'always-unless-stopped', healthcheck: probe() })
        )
      );

      await orchestrator.up();
      await flush();
      await orchestrator.stop('db');
      await flush();
      await tick(60_000);

      const { services } = orchestrator.getStatus();
      expect(runtime.stopped).toEqual(['db']);
      expect(runtime.started).toEqual(['db']);
      expect(services.db.status).toBe('stopped');
      expect(services.backend.status).toBe('stopped');
      expect(services.frontend.status).toBe('stopped');
      expect(runtime.probeCalls.get('db')).toBeUndefined();
      expect(timers.pending()).toBe(0);
    });

    it('should reject an unknown service with UnknownServiceError', async () => {
      const orchestrator = orchestrate(threeTier());

      await expect(orchestrator.stop('ghost')).rejects.toThrow(UnknownServiceError);
      await expect(orchestrator.stop('ghost')).rejects.toThrow('Unknown service "ghost"');
      await expect(orchestrator.stop('toString')).rejects.toThrow(UnknownServiceError);
      expect(runtime.stopped).toEqual([]);
    });
  });

  describe('down', () => {
    it('should stop and remove containers in reverse start order', async () => {
      const orchestrator = orchestrate(threeTier());
      const done = vi.fn();
      orchestrator.on('done', done);

      await orchestrator.up();
      await tick(10_000);
      await orchestrator.down();

      expect(runtime.stopped).toEqual(['frontend', 'backend', 'db']);
      expect(runtime.removed).toEqual(['frontend', 'backend', 'db']);
      expect(runtime.removedNetworks).toEqual(['default']);
      expect(runtime.removedVolumes).toEqual([]);
      expect(done).toHaveBeenCalledOnce();
    });

    it('should remove volumes when asked', async () => {
      const orchestrator = orchestrate(threeTier());

      await orchestrator.up();
      await tick(10_000);
      await orchestrator.down({ volumes: true });

      expect(runtime.removedVolumes).toEqual(['shop_data']);
    });

    it('should clean up containers it never started', async () => {
      const orchestrator = orchestrate(threeTier());

      await orchestrator.down();

      expect(runtime.stopped).toEqual(['frontend', 'backend', 'db']);
      expect(runtime.removed).toEqual(['frontend', 'backend', 'db']);
    });
  });
});

describe('isDeploymentHealthy', () => {
  it('should require every service running and healthy or unprobed', () => {
    const base = {
      name: 'x',
      launched: true,
      restartCount: 0,
      lastExitCode: null,
      startedAt: 0,
      blockedOn: [],
      failure: null,
      stopRequested: false,
    };

    expect(
      isDeploymentHealthy({
        a: { ...base, name: 'a', status: 'running', health: 'none' },
        b: { ...base, name: 'b', status: 'running', health: 'healthy' },
      })
    ).toBe(true);
    expect(isDeploymentHealthy({ a: { ...base, name: 'a', status: 'running', health: 'probing' } })).toBe(false);
    expect(isDeploymentHealthy({ a: { ...base, name: 'a', status: 'exited', health: 'none' } })).toBe(false);
  });
});
