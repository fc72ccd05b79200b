import type { Logger } from 'pino';
import { serviceLogger } from './logger';
import { runProbe } from './probe';
import type { ProbeExecutor } from './probe';
import type { TimerHandle, TimerQueue } from './timer-queue';
import type { HealthProbe, HealthStatus } from './types';

export interface HealthTransition {
  from: HealthStatus;
  to: HealthStatus;
  failures: number;
  error?: Error;
}

export interface HealthMonitorOptions {
  service: string;
  probe: HealthProbe;
  exec: ProbeExecutor;
  timers: TimerQueue;
  onTransition: (transition: HealthTransition) => void;
}

/**
 * Probe loop for one launched container.
 *
 * starting -> probing -> healthy, or probing -> unhealthy. The first check
 * runs one interval after launch and every interval after that. Reaching
 * `retries` consecutive failures ends the loop as unhealthy; a healthy
 * service keeps being probed and can still turn unhealthy.
 */
export class HealthMonitor {
  private status: HealthStatus = 'starting';
  private failures = 0;
  private stopped = false;
  private handle: TimerHandle | null = null;
  private readonly launchedAt = Date.now();
  private readonly log: Logger;

  constructor(private readonly options: HealthMonitorOptions) {
    this.log = serviceLogger(options.service);
  }

  getStatus(): HealthStatus {
    return this.status;
  }

  getFailures(): number {
    return this.failures;
  }

  start(): void {
    this.scheduleNext();
  }

  stop(): void {
    this.stopped = true;
    this.handle?.cancel();
    this.handle = null;
  }

  private scheduleNext(): void {
    if (this.stopped) return;
    this.handle = this.options.timers.schedule(this.options.service, this.options.probe.intervalMs, () => {
      this.handle = null;
      this.check().catch((err) => {
        this.log.error({ err }, 'Health probe loop failed');
      });
    });
  }

  private async check(): Promise<void> {
    if (this.stopped) return;
    if (this.status === 'starting') {
      this.transition('probing');
    }

    const { service, probe, exec } = this.options;
    const outcome = await runProbe(service, probe, exec);
    if (this.stopped) return;

    if (outcome.ok) {
      this.failures = 0;
      if (this.status !== 'healthy') {
        this.transition('healthy');
      }
      this.scheduleNext();
      return;
    }

    const inStartPeriod = this.status !== 'healthy' && Date.now() - this.launchedAt < probe.startPeriodMs;
    if (!inStartPeriod) {
      this.failures += 1;
    }
    this.log.debug({ err: outcome.error, failures: this.failures, retries: probe.retries }, 'Health probe failed');

    if (this.failures >= probe.retries) {
      this.stopped = true;
      this.transition('unhealthy', outcome.error);
      return;
    }

    this.scheduleNext();
  }

  private transition(to: HealthStatus, error?: Error): void {
    const from = this.status;
    this.status = to;
    this.log.info({ from, to, failures: this.failures }, 'Health state changed');
    this.options.onTransition({ from, to, failures: this.failures, error });
  }
}
