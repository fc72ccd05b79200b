import { formatDuration } from './duration';
import { buildNameTable, reachablePeers } from './network';
import type { Deployment } from './types';

/**
 * Human-readable summary of a normalized deployment, one line per fact.
 */
export const describeDeployment = (deployment: Deployment): string[] => {
  const table = buildNameTable(deployment.services);
  const lines = [`project: ${deployment.project}`];

  for (const service of Object.values(deployment.services)) {
    lines.push(`${service.name} (${service.image})`);
    lines.push(`  restart: ${service.restart}${service.maxRestarts !== undefined ? ` (max ${service.maxRestarts})` : ''}`);
    if (service.dependsOn.length > 0) {
      lines.push(`  depends on: ${service.dependsOn.map((d) => `${d.service} [${d.condition}]`).join(', ')}`);
    }
    if (service.healthcheck) {
      const { intervalMs, timeoutMs, retries } = service.healthcheck;
      lines.push(
        `  healthcheck: every ${formatDuration(intervalMs)}, timeout ${formatDuration(timeoutMs)}, ${retries} retries`
      );
    }
    lines.push(`  networks: ${service.networks.map((m) => m.network).join(', ')}`);
    lines.push(`  reaches: ${reachablePeers(table, service.name).join(', ') || '(none)'}`);
  }

  return lines;
};
