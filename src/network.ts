import { DuplicateAliasError } from './errors';
import type { ServiceSpec } from './types';

/**
 * Per service: every name it can resolve, mapped to the service it reaches.
 */
export type NameTable = Map<string, Map<string, string>>;

/**
 * Names a service answers to: its service name, its container name and the
 * aliases it declares on that network.
 */
const namesOn = (service: ServiceSpec, network: string): string[] => {
  const names = [service.name];
  if (service.containerName !== undefined) names.push(service.containerName);
  const membership = service.networks.find((m) => m.network === network);
  if (membership !== undefined) names.push(...membership.aliases);
  return names;
};

/**
 * Build the name registry of every segment. A name may be claimed by only
 * one service per segment; the same alias on different segments is fine.
 */
export const buildSegments = (services: Record<string, ServiceSpec>): Map<string, Map<string, string>> => {
  const segments = new Map<string, Map<string, string>>();

  for (const service of Object.values(services)) {
    for (const { network } of service.networks) {
      let registry = segments.get(network);
      if (registry === undefined) {
        registry = new Map();
        segments.set(network, registry);
      }
      for (const name of namesOn(service, network)) {
        const owner = registry.get(name);
        if (owner !== undefined && owner !== service.name) {
          throw new DuplicateAliasError(network, name, [owner, service.name]);
        }
        registry.set(name, service.name);
      }
    }
  }

  return segments;
};

/**
 * Compute what each service can resolve. Only shared segments count; when a
 * name exists on several of the caller's segments, the first membership in
 * the caller's declaration order wins.
 */
export const buildNameTable = (services: Record<string, ServiceSpec>): NameTable => {
  const segments = buildSegments(services);
  const table: NameTable = new Map();

  for (const service of Object.values(services)) {
    const visible = new Map<string, string>();
    for (const { network } of service.networks) {
      for (const [name, target] of segments.get(network) ?? []) {
        if (!visible.has(name)) visible.set(name, target);
      }
    }
    table.set(service.name, visible);
  }

  return table;
};

export const resolvePeer = (table: NameTable, from: string, name: string): string | undefined =>
  table.get(from)?.get(name);

export const canResolve = (table: NameTable, from: string, name: string): boolean =>
  resolvePeer(table, from, name) !== undefined;

/**
 * Other services reachable from `from`, sorted by name.
 */
export const reachablePeers = (table: NameTable, from: string): string[] => {
  const peers = new Set(table.get(from)?.values() ?? []);
  peers.delete(from);
  return [...peers].sort();
};
