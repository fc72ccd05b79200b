import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import { serviceLogger } from './logger';
import { volumeId } from './manifest';
import type { ContainerRuntime, RunningContainer } from './runtime';
import type { NetworkSpec, PortBinding, ProbeCommand, ServiceSpec, VolumeSpec } from './types';

const PROJECT_LABEL = 'io.stackgate.project';
const SERVICE_LABEL = 'io.stackgate.service';

export interface DockerRuntimeOptions {
  project: string;
  /** Path of the docker CLI. */
  binary?: string;
}

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export const containerNameFor = (project: string, service: ServiceSpec): string =>
  service.containerName ?? `${project}-${service.name}-1`;

export const networkNameFor = (project: string, network: string): string => `${project}_${network}`;

export const formatPort = (port: PortBinding): string => {
  const host = port.hostPort === undefined ? '' : `${port.hostIp ? `${port.hostIp}:` : ''}${port.hostPort}:`;
  return `${host}${port.containerPort}/${port.protocol}`;
};

/**
 * Arguments for `docker create`. The container joins only its first network
 * here; further memberships are attached with `docker network connect`.
 * Restart handling stays with the orchestrator, so no `--restart` is passed.
 */
export const buildCreateArgs = (project: string, service: ServiceSpec): string[] => {
  const args = [
    'create',
    '--name',
    containerNameFor(project, service),
    '--label',
    `${PROJECT_LABEL}=${project}`,
    '--label',
    `${SERVICE_LABEL}=${service.name}`,
  ];

  const [primary] = service.networks;
  if (primary !== undefined) {
    args.push('--network', networkNameFor(project, primary.network));
    for (const alias of [service.name, ...primary.aliases]) {
      args.push('--network-alias', alias);
    }
  }

  for (const port of service.ports) {
    args.push('--publish', formatPort(port));
  }

  for (const mount of service.volumes) {
    args.push('--volume', `${volumeId(project, mount.volume)}:${mount.target}${mount.readOnly ? ':ro' : ''}`);
  }

  for (const [key, value] of Object.entries(service.environment)) {
    args.push('--env', `${key}=${value}`);
  }

  args.push(service.image);
  return args;
};

export const buildExecArgs = (container: string, command: ProbeCommand): string[] =>
  command.kind === 'CMD'
    ? ['exec', container, ...command.argv]
    : ['exec', container, '/bin/sh', '-c', command.script];

/**
 * Container runtime backed by the docker CLI.
 */
export class DockerRuntime implements ContainerRuntime {
  private readonly binary: string;
  private readonly project: string;

  constructor(options: DockerRuntimeOptions) {
    this.project = options.project;
    this.binary = options.binary ?? 'docker';
  }

  run(args: string[], signal?: AbortSignal): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.binary, args, { signal, stdio: ['ignore', 'pipe', 'pipe'] });
      let stdout = '';
      let stderr = '';
      child.stdout.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      child.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });
      child.on('error', reject);
      child.on('close', (code) => resolve({ code: code ?? 1, stdout, stderr }));
    });
  }

  private async runChecked(args: string[]): Promise<CommandResult> {
    const result = await this.run(args);
    if (result.code !== 0) {
      throw new Error(`${this.binary} ${args[0]} ${args[1] ?? ''} failed: ${result.stderr.trim()}`);
    }
    return result;
  }

  async ensureNetwork(network: NetworkSpec): Promise<void> {
    const name = networkNameFor(this.project, network.name);
    const inspect = await this.run(['network', 'inspect', name]);
    if (inspect.code === 0) return;

    const args = ['network', 'create', '--label', `${PROJECT_LABEL}=${this.project}`];
    if (network.driver !== undefined) args.push('--driver', network.driver);
    if (network.internal) args.push('--internal');
    await this.runChecked([...args, name]);
  }

  async removeNetwork(network: NetworkSpec): Promise<void> {
    await this.run(['network', 'rm', networkNameFor(this.project, network.name)]);
  }

  async ensureVolume(volume: VolumeSpec): Promise<void> {
    await this.runChecked(['volume', 'create', '--label', `${PROJECT_LABEL}=${this.project}`, volume.id]);
  }

  async removeVolume(volume: VolumeSpec): Promise<void> {
    await this.run(['volume', 'rm', volume.id]);
  }

  async start(service: ServiceSpec): Promise<RunningContainer> {
    const name = containerNameFor(this.project, service);

    await this.run(['rm', '--force', name]);
    await this.runChecked(buildCreateArgs(this.project, service));

    for (const membership of service.networks.slice(1)) {
      const args = ['network', 'connect'];
      for (const alias of [service.name, ...membership.aliases]) {
        args.push('--alias', alias);
      }
      await this.runChecked([...args, networkNameFor(this.project, membership.network), name]);
    }

    return { id: name, exited: this.attach(service, name) };
  }

  /**
   * `start --attach` exits with the container's own exit code. Output is
   * forwarded line by line to the service logger.
   */
  private attach(service: ServiceSpec, name: string): Promise<number> {
    const log = serviceLogger(service.name);

    return new Promise((resolve, reject) => {
      const child = spawn(this.binary, ['start', '--attach', name], { stdio: ['ignore', 'pipe', 'pipe'] });
      createInterface({ input: child.stdout }).on('line', (line) => log.info({ stream: 'stdout' }, line));
      createInterface({ input: child.stderr }).on('line', (line) => log.info({ stream: 'stderr' }, line));
      child.on('error', reject);
      child.on('close', (code) => {
        log.debug({ code }, 'Container process ended');
        resolve(code ?? 1);
      });
    });
  }

  async stop(service: ServiceSpec): Promise<void> {
    await this.run(['stop', containerNameFor(this.project, service)]);
  }

  async remove(service: ServiceSpec): Promise<void> {
    await this.run(['rm', '--force', containerNameFor(this.project, service)]);
  }

  async exec(service: ServiceSpec, command: ProbeCommand, signal: AbortSignal): Promise<number> {
    const result = await this.run(buildExecArgs(containerNameFor(this.project, service), command), signal);
    return result.code;
  }
}
