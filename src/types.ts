export type RestartPolicy = 'never' | 'on-failure' | 'always-unless-stopped';

export type DependencyCondition = 'started' | 'healthy';

export interface Dependency {
  service: string;
  condition: DependencyCondition;
}

/**
 * `CMD` runs the argv directly, `CMD-SHELL` runs the string through `/bin/sh -c`.
 */
export type ProbeCommand =
  | { kind: 'CMD'; argv: string[] }
  | { kind: 'CMD-SHELL'; script: string };

export interface HealthProbe {
  test: ProbeCommand;
  intervalMs: number;
  timeoutMs: number;
  retries: number;
  /** Failures within this window after launch do not count toward `retries`. */
  startPeriodMs: number;
}

export interface PortBinding {
  hostIp?: string;
  hostPort?: number;
  containerPort: number;
  protocol: 'tcp' | 'udp';
}

export interface NetworkMembership {
  network: string;
  aliases: string[];
}

export interface VolumeMount {
  volume: string;
  target: string;
  readOnly: boolean;
}

export interface ServiceSpec {
  name: string;
  image: string;
  containerName?: string;
  ports: PortBinding[];
  restart: RestartPolicy;
  /** Cap on restarts under `on-failure`; unbounded when absent. */
  maxRestarts?: number;
  networks: NetworkMembership[];
  dependsOn: Dependency[];
  healthcheck?: HealthProbe;
  volumes: VolumeMount[];
  environment: Record<string, string>;
}

export interface NetworkSpec {
  name: string;
  driver?: string;
  internal: boolean;
}

export interface VolumeSpec {
  name: string;
  /** Stable identity across restarts and recreation: `<project>_<name>`. */
  id: string;
}

export interface Deployment {
  project: string;
  services: Record<string, ServiceSpec>;
  networks: Record<string, NetworkSpec>;
  volumes: Record<string, VolumeSpec>;
}

export type HealthStatus = 'none' | 'starting' | 'probing' | 'healthy' | 'unhealthy';

export type ServiceStatus =
  | 'pending'
  | 'blocked'
  | 'starting'
  | 'running'
  | 'exited'
  | 'restarting'
  | 'stopped'
  | 'failed';
