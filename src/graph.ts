import { CyclicDependencyError, UnknownDependencyError } from './errors';
import type { ServiceSpec } from './types';

/**
 * Index-based dependency graph. Edges point from a dependency to the
 * services that depend on it.
 */
export interface DependencyGraph {
  names: string[];
  index: Map<string, number>;
  dependents: number[][];
  inDegree: number[];
}

/**
 * Build the graph, rejecting dependencies on services that do not exist.
 * Repeated dependency entries count once.
 */
export const buildDependencyGraph = (services: Record<string, ServiceSpec>): DependencyGraph => {
  const names = Object.keys(services);
  const index = new Map<string, number>();
  names.forEach((name, i) => index.set(name, i));

  const dependents: number[][] = names.map(() => []);
  const inDegree: number[] = names.map(() => 0);

  names.forEach((name, i) => {
    const seen = new Set<number>();
    for (const dep of services[name].dependsOn) {
      const target = index.get(dep.service);
      if (target === undefined) {
        throw new UnknownDependencyError(name, dep.service);
      }
      if (seen.has(target)) continue;
      seen.add(target);
      dependents[target].push(i);
      inDegree[i] += 1;
    }
  });

  return { names, index, dependents, inDegree };
};

/**
 * Compute start batches by repeatedly removing zero in-degree nodes.
 *
 * Services in one batch have no dependency on each other and may start
 * concurrently. Within a batch, names keep declaration order, which is for
 * display only.
 */
export const resolveStartOrder = (services: Record<string, ServiceSpec>): string[][] => {
  const graph = buildDependencyGraph(services);
  const remaining = [...graph.inDegree];
  const batches: string[][] = [];

  let current: number[] = [];
  remaining.forEach((degree, i) => {
    if (degree === 0) current.push(i);
  });

  let resolved = 0;
  while (current.length > 0) {
    batches.push(current.map((i) => graph.names[i]));
    resolved += current.length;

    const next: number[] = [];
    for (const i of current) {
      for (const dependent of graph.dependents[i]) {
        remaining[dependent] -= 1;
        if (remaining[dependent] === 0) next.push(dependent);
      }
    }
    next.sort((a, b) => a - b);
    current = next;
  }

  if (resolved < graph.names.length) {
    throw new CyclicDependencyError(graph.names.filter((_, i) => remaining[i] > 0));
  }

  return batches;
};

/**
 * All services that depend on `name`, directly or transitively.
 */
export const transitiveDependents = (services: Record<string, ServiceSpec>, name: string): string[] => {
  const graph = buildDependencyGraph(services);
  const start = graph.index.get(name);
  if (start === undefined) return [];

  const visited = new Set<number>([start]);
  const stack = [start];
  const result: string[] = [];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;
    for (const dependent of graph.dependents[node]) {
      if (visited.has(dependent)) continue;
      visited.add(dependent);
      result.push(graph.names[dependent]);
      stack.push(dependent);
    }
  }

  return result;
};
