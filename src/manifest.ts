import { readFile } from 'node:fs/promises';
import { basename, dirname, resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { parseDuration } from './duration';
import { ManifestError } from './errors';
import { buildSegments } from './network';
import type {
  Dependency,
  Deployment,
  HealthProbe,
  NetworkMembership,
  NetworkSpec,
  PortBinding,
  ProbeCommand,
  RestartPolicy,
  ServiceSpec,
  VolumeMount,
  VolumeSpec,
} from './types';

export const DEFAULT_MANIFEST = 'docker-compose.yaml';
export const DEFAULT_NETWORK = 'default';

/** Probe defaults when a healthcheck leaves a field out. */
export const PROBE_DEFAULTS = {
  intervalMs: 30_000,
  timeoutMs: 30_000,
  retries: 3,
  startPeriodMs: 0,
} as const;

export interface ManifestOptions {
  /** Overrides the top-level `name`. */
  project?: string;
  /** Used when neither `project` nor a top-level `name` is given. */
  defaultProject?: string;
}

type RawRecord = Record<string, unknown>;

const validTopLevelKeys = new Set(['version', 'name', 'services', 'networks', 'volumes']);

const validServiceKeys = new Set([
  'image',
  'container_name',
  'restart',
  'ports',
  'networks',
  'depends_on',
  'healthcheck',
  'volumes',
  'environment',
]);

const validHealthcheckKeys = new Set(['test', 'interval', 'timeout', 'retries', 'start_period', 'disable']);

const validNetworkKeys = new Set(['driver', 'internal']);

const NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;

const isRecord = (value: unknown): value is RawRecord =>
  value !== null && typeof value === 'object' && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string');

const assertKnownKeys = (raw: RawRecord, valid: Set<string>, where: string) => {
  const unknownKeys = Object.keys(raw).filter((key) => !valid.has(key));
  if (unknownKeys.length > 0) {
    throw new ManifestError(`${where} has unknown keys: ${unknownKeys.join(', ')}`);
  }
};

/**
 * Lowercase, keep `[a-z0-9_-]`, as container runtimes expect for prefixes.
 */
export const normalizeProjectName = (name: string): string => {
  const normalized = name.toLowerCase().replace(/[^a-z0-9_-]/g, '');
  if (normalized.length === 0) {
    throw new ManifestError(`Project name "${name}" has no usable characters`);
  }
  return normalized;
};

export const volumeId = (project: string, volume: string): string => `${project}_${volume}`;

const parseRestart = (value: unknown, where: string): { restart: RestartPolicy; maxRestarts?: number } => {
  if (value === undefined || value === 'no' || value === false) return { restart: 'never' };
  if (value === 'always' || value === 'unless-stopped') return { restart: 'always-unless-stopped' };
  if (value === 'on-failure') return { restart: 'on-failure' };

  if (typeof value === 'string') {
    const match = /^on-failure:(\d+)$/.exec(value);
    if (match) return { restart: 'on-failure', maxRestarts: Number(match[1]) };
  }

  throw new ManifestError(`${where}.restart must be one of no | always | on-failure[:N] | unless-stopped`);
};

const parsePort = (value: unknown, where: string): PortBinding => {
  const text = typeof value === 'number' ? String(value) : value;
  if (typeof text !== 'string') {
    throw new ManifestError(`${where} must be a string or number`);
  }

  const [mapping, protocol = 'tcp'] = text.split('/');
  if (protocol !== 'tcp' && protocol !== 'udp') {
    throw new ManifestError(`${where} has unsupported protocol "${protocol}"`);
  }

  const parts = mapping.split(':');
  if (parts.length > 3) {
    throw new ManifestError(`${where} "${text}" is not [ip:]host:container`);
  }

  const toPort = (part: string): number => {
    const port = Number(part);
    if (!/^\d+$/.test(part) || port < 1 || port > 65535) {
      throw new ManifestError(`${where} "${text}" has invalid port "${part}"`);
    }
    return port;
  };

  const containerPort = toPort(parts[parts.length - 1]);
  if (parts.length === 1) return { containerPort, protocol };
  if (parts.length === 2) return { hostPort: toPort(parts[0]), containerPort, protocol };
  return { hostIp: parts[0], hostPort: toPort(parts[1]), containerPort, protocol };
};

const parseNetworks = (value: unknown, where: string): NetworkMembership[] => {
  if (value === undefined) return [{ network: DEFAULT_NETWORK, aliases: [] }];

  if (isStringArray(value)) {
    return value.map((network) => ({ network, aliases: [] }));
  }

  if (isRecord(value)) {
    return Object.entries(value).map(([network, config]) => {
      if (config === null || config === undefined) return { network, aliases: [] };
      if (!isRecord(config)) {
        throw new ManifestError(`${where}.networks.${network} must be a mapping`);
      }
      assertKnownKeys(config, new Set(['aliases']), `${where}.networks.${network}`);
      const aliases = config.aliases ?? [];
      if (!isStringArray(aliases)) {
        throw new ManifestError(`${where}.networks.${network}.aliases must be string[]`);
      }
      return { network, aliases };
    });
  }

  throw new ManifestError(`${where}.networks must be a list or a mapping`);
};

const parseDependsOn = (value: unknown, where: string): Dependency[] => {
  if (value === undefined) return [];

  if (isStringArray(value)) {
    return value.map((service): Dependency => ({ service, condition: 'started' }));
  }

  if (isRecord(value)) {
    return Object.entries(value).map(([service, config]): Dependency => {
      if (config === null) return { service, condition: 'started' };
      if (!isRecord(config)) {
        throw new ManifestError(`${where}.depends_on.${service} must be a mapping`);
      }
      assertKnownKeys(config, new Set(['condition']), `${where}.depends_on.${service}`);
      switch (config.condition) {
        case undefined:
        case 'service_started':
          return { service, condition: 'started' };
        case 'service_healthy':
          return { service, condition: 'healthy' };
        default:
          throw new ManifestError(
            `${where}.depends_on.${service}.condition must be service_started | service_healthy`
          );
      }
    });
  }

  throw new ManifestError(`${where}.depends_on must be a list or a mapping`);
};

const parseProbeCommand = (value: unknown, where: string): ProbeCommand | null => {
  if (typeof value === 'string') {
    if (value.trim().length === 0) throw new ManifestError(`${where}.test must not be empty`);
    return { kind: 'CMD-SHELL', script: value };
  }

  if (!isStringArray(value) || value.length === 0) {
    throw new ManifestError(`${where}.test must be a string or a non-empty string[]`);
  }

  const [kind, ...rest] = value;
  switch (kind) {
    case 'NONE':
      return null;
    case 'CMD':
      if (rest.length === 0) throw new ManifestError(`${where}.test CMD needs a command`);
      return { kind: 'CMD', argv: rest };
    case 'CMD-SHELL':
      if (rest.length !== 1) throw new ManifestError(`${where}.test CMD-SHELL takes exactly one script`);
      return { kind: 'CMD-SHELL', script: rest[0] };
    default:
      throw new ManifestError(`${where}.test must start with CMD, CMD-SHELL or NONE`);
  }
};

const durationField = (raw: RawRecord, key: string, fallback: number, where: string): number => {
  const value = raw[key];
  if (value === undefined) return fallback;
  const ms = typeof value === 'string' ? parseDuration(value) : undefined;
  if (ms === undefined) {
    throw new ManifestError(`${where}.${key} must be a duration such as 10s or 1m30s`);
  }
  return ms;
};

const parseHealthcheck = (value: unknown, where: string): HealthProbe | undefined => {
  if (value === undefined) return undefined;
  if (!isRecord(value)) throw new ManifestError(`${where}.healthcheck must be a mapping`);

  const at = `${where}.healthcheck`;
  assertKnownKeys(value, validHealthcheckKeys, at);
  if (value.disable === true) return undefined;
  if (value.test === undefined) throw new ManifestError(`${at}.test is required`);

  const test = parseProbeCommand(value.test, at);
  if (test === null) return undefined;

  const retries = value.retries ?? PROBE_DEFAULTS.retries;
  if (typeof retries !== 'number' || !Number.isInteger(retries) || retries < 1) {
    throw new ManifestError(`${at}.retries must be a positive integer`);
  }

  const intervalMs = durationField(value, 'interval', PROBE_DEFAULTS.intervalMs, at);
  const timeoutMs = durationField(value, 'timeout', PROBE_DEFAULTS.timeoutMs, at);
  if (intervalMs <= 0 || timeoutMs <= 0) {
    throw new ManifestError(`${at}.interval and timeout must be greater than zero`);
  }

  return {
    test,
    intervalMs,
    timeoutMs,
    retries,
    startPeriodMs: durationField(value, 'start_period', PROBE_DEFAULTS.startPeriodMs, at),
  };
};

const parseVolumes = (value: unknown, where: string): VolumeMount[] => {
  if (value === undefined) return [];
  if (!isStringArray(value)) throw new ManifestError(`${where}.volumes must be string[]`);

  return value.map((entry) => {
    const [volume, target, mode, ...extra] = entry.split(':');
    if (volume === undefined || target === undefined || extra.length > 0) {
      throw new ManifestError(`${where}.volumes entry "${entry}" must be name:/path[:ro]`);
    }
    if (volume.startsWith('/') || volume.startsWith('.') || volume.startsWith('~')) {
      throw new ManifestError(`${where}.volumes entry "${entry}" is a bind mount; only named volumes are supported`);
    }
    if (!target.startsWith('/')) {
      throw new ManifestError(`${where}.volumes entry "${entry}" must mount at an absolute path`);
    }
    if (mode !== undefined && mode !== 'ro' && mode !== 'rw') {
      throw new ManifestError(`${where}.volumes entry "${entry}" has unknown mode "${mode}"`);
    }
    return { volume, target, readOnly: mode === 'ro' };
  });
};

const parseEnvironment = (value: unknown, where: string): Record<string, string> => {
  if (value === undefined || value === null) return {};

  if (isStringArray(value)) {
    const env: Record<string, string> = {};
    for (const entry of value) {
      const eq = entry.indexOf('=');
      if (eq <= 0) throw new ManifestError(`${where}.environment entry "${entry}" must be KEY=VALUE`);
      env[entry.slice(0, eq)] = entry.slice(eq + 1);
    }
    return env;
  }

  if (!isRecord(value)) {
    throw new ManifestError(`${where}.environment must be a mapping or a KEY=VALUE list`);
  }

  const env: Record<string, string> = {};
  for (const [key, raw] of Object.entries(value)) {
    if (raw === null) {
      env[key] = '';
    } else if (typeof raw === 'string') {
      env[key] = raw;
    } else if (typeof raw === 'number' || typeof raw === 'boolean') {
      env[key] = String(raw);
    } else {
      throw new ManifestError(`${where}.environment.${key} must be string | number | boolean`);
    }
  }
  return env;
};

const parseService = (name: string, raw: unknown): ServiceSpec => {
  const where = `services.${name}`;
  if (!NAME_PATTERN.test(name)) {
    throw new ManifestError(`${where}: invalid service name`);
  }
  if (!isRecord(raw)) {
    throw new ManifestError(`${where} must be a mapping`);
  }
  assertKnownKeys(raw, validServiceKeys, where);

  const image = raw.image;
  if (typeof image !== 'string' || image.length === 0) {
    throw new ManifestError(`${where}.image must be a string`);
  }

  const containerName = raw.container_name;
  if (containerName !== undefined && typeof containerName !== 'string') {
    throw new ManifestError(`${where}.container_name must be a string`);
  }

  const ports = raw.ports ?? [];
  if (!Array.isArray(ports)) {
    throw new ManifestError(`${where}.ports must be a list`);
  }

  return {
    name,
    image,
    containerName,
    ports: ports.map((port, i) => parsePort(port, `${where}.ports[${i}]`)),
    ...parseRestart(raw.restart, where),
    networks: parseNetworks(raw.networks, where),
    dependsOn: parseDependsOn(raw.depends_on, where),
    healthcheck: parseHealthcheck(raw.healthcheck, where),
    volumes: parseVolumes(raw.volumes, where),
    environment: parseEnvironment(raw.environment, where),
  };
};

const parseNetworkDefinitions = (value: unknown): Record<string, NetworkSpec> => {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) throw new ManifestError('networks must be a mapping');

  const networks: Record<string, NetworkSpec> = {};
  for (const [name, config] of Object.entries(value)) {
    if (config === null || config === undefined) {
      networks[name] = { name, internal: false };
      continue;
    }
    if (!isRecord(config)) throw new ManifestError(`networks.${name} must be a mapping`);
    assertKnownKeys(config, validNetworkKeys, `networks.${name}`);
    const { driver, internal = false } = config;
    if (driver !== undefined && typeof driver !== 'string') {
      throw new ManifestError(`networks.${name}.driver must be a string`);
    }
    if (typeof internal !== 'boolean') {
      throw new ManifestError(`networks.${name}.internal must be a boolean`);
    }
    networks[name] = { name, driver, internal };
  }
  return networks;
};

const parseVolumeDefinitions = (value: unknown, project: string): Record<string, VolumeSpec> => {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) throw new ManifestError('volumes must be a mapping');

  const volumes: Record<string, VolumeSpec> = {};
  for (const [name, config] of Object.entries(value)) {
    if (config !== null && !(isRecord(config) && Object.keys(config).length === 0)) {
      throw new ManifestError(`volumes.${name} options are not supported`);
    }
    volumes[name] = { name, id: volumeId(project, name) };
  }
  return volumes;
};

/**
 * Cross-reference checks that need the whole deployment. Dependency names
 * themselves are checked by the start-order resolver.
 */
const validateDeployment = (deployment: Deployment) => {
  const { services, networks, volumes } = deployment;
  const mountedBy = new Map<string, string>();
  const containerNames = new Map<string, string>();

  for (const service of Object.values(services)) {
    const where = `services.${service.name}`;

    for (const dependency of service.dependsOn) {
      const target = Object.hasOwn(services, dependency.service) ? services[dependency.service] : undefined;
      if (dependency.condition === 'healthy' && target !== undefined && target.healthcheck === undefined) {
        throw new ManifestError(
          `${where} waits for "${dependency.service}" to be healthy, but it has no healthcheck`
        );
      }
    }

    for (const { network } of service.networks) {
      if (!Object.hasOwn(networks, network)) {
        throw new ManifestError(`${where} joins undeclared network "${network}"`);
      }
    }

    for (const mount of service.volumes) {
      if (!Object.hasOwn(volumes, mount.volume)) {
        throw new ManifestError(`${where} mounts undeclared volume "${mount.volume}"`);
      }
      const owner = mountedBy.get(mount.volume);
      if (owner !== undefined) {
        throw new ManifestError(`Volume "${mount.volume}" is mounted by both "${owner}" and "${service.name}"`);
      }
      mountedBy.set(mount.volume, service.name);
    }

    if (service.containerName !== undefined) {
      const owner = containerNames.get(service.containerName);
      if (owner !== undefined) {
        throw new ManifestError(`Container name "${service.containerName}" is used by "${owner}" and "${service.name}"`);
      }
      containerNames.set(service.containerName, service.name);
    }
  }

  buildSegments(services);
};

/**
 * Parse compose YAML into a validated deployment.
 */
export const parseManifest = (text: string, options: ManifestOptions = {}): Deployment => {
  let parsed: unknown;
  try {
    parsed = yaml.load(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ManifestError(`Invalid YAML: ${message}`);
  }

  if (!isRecord(parsed)) {
    throw new ManifestError('Manifest must be a mapping');
  }
  assertKnownKeys(parsed, validTopLevelKeys, 'manifest');

  const rawName = options.project ?? parsed.name ?? options.defaultProject;
  if (typeof rawName !== 'string') {
    throw new ManifestError('Project name is required (top-level name or an explicit project)');
  }
  const project = normalizeProjectName(rawName);

  const rawServices = parsed.services;
  if (!isRecord(rawServices) || Object.keys(rawServices).length === 0) {
    throw new ManifestError('services must be a non-empty mapping');
  }

  const services: Record<string, ServiceSpec> = {};
  for (const [name, raw] of Object.entries(rawServices)) {
    services[name] = parseService(name, raw);
  }

  const networks = parseNetworkDefinitions(parsed.networks);
  const usesDefault = Object.values(services).some((service) =>
    service.networks.some((membership) => membership.network === DEFAULT_NETWORK)
  );
  if (usesDefault && !Object.hasOwn(networks, DEFAULT_NETWORK)) {
    networks[DEFAULT_NETWORK] = { name: DEFAULT_NETWORK, internal: false };
  }

  const deployment: Deployment = {
    project,
    services,
    networks,
    volumes: parseVolumeDefinitions(parsed.volumes, project),
  };

  validateDeployment(deployment);
  return deployment;
};

/**
 * Read and parse a manifest file. The project name falls back to the name of
 * the directory holding the file.
 */
export const loadManifest = async (path: string = DEFAULT_MANIFEST, options: ManifestOptions = {}): Promise<Deployment> => {
  const manifestPath = resolve(path);

  let contents: string;
  try {
    contents = await readFile(manifestPath, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ManifestError(`Cannot read manifest ${manifestPath}: ${message}`);
  }

  return parseManifest(contents, {
    project: options.project,
    defaultProject: options.defaultProject ?? basename(dirname(manifestPath)),
  });
};
