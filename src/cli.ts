#!/usr/bin/env node
import { Command } from 'commander';
import { loadConfig } from './config';
import type { StackgateConfig } from './config';
import { DockerRuntime } from './docker-runtime';
import { describeDeployment } from './describe';
import { parseDuration } from './duration';
import { ConfigError } from './errors';
import { resolveStartOrder } from './graph';
import logger from './logger';
import { loadManifest } from './manifest';
import { createOrchestrator } from './orchestrator';
import { supervise } from './supervise';
import type { Deployment } from './types';

interface GlobalOptions {
  file?: string;
  project?: string;
}

const resolveConfig = (options: GlobalOptions): StackgateConfig => {
  const config = loadConfig();
  return {
    ...config,
    file: options.file ?? config.file,
    project: options.project ?? config.project,
  };
};

const loadDeployment = (config: StackgateConfig): Promise<Deployment> =>
  loadManifest(config.file, { project: config.project });

const program = new Command();

program
  .name('stackgate')
  .description('Dependency-ordered, health-gated supervisor for compose-style deployments')
  .version('0.1.0')
  .option('-f, --file <path>', 'compose file (env STACKGATE_FILE)')
  .option('-p, --project <name>', 'project name (env STACKGATE_PROJECT)');

program
  .command('plan')
  .description('print the start batches')
  .action(async () => {
    const deployment = await loadDeployment(resolveConfig(program.opts<GlobalOptions>()));
    resolveStartOrder(deployment.services).forEach((batch, i) => {
      console.log(`${i + 1}. ${batch.join(', ')}`);
    });
  });

program
  .command('config')
  .description('validate the compose file and print the normalized deployment')
  .action(async () => {
    const deployment = await loadDeployment(resolveConfig(program.opts<GlobalOptions>()));
    console.log(describeDeployment(deployment).join('\n'));
  });

program
  .command('up')
  .description('start every service and supervise until interrupted')
  .option('--dependency-timeout <duration>', 'fail a blocked start after this long')
  .option('--no-status', 'do not start the status endpoint')
  .action(async (options: { dependencyTimeout?: string; status: boolean }) => {
    const config = resolveConfig(program.opts<GlobalOptions>());
    const deployment = await loadDeployment(config);

    let dependencyTimeoutMs = config.dependencyTimeoutMs;
    if (options.dependencyTimeout !== undefined) {
      dependencyTimeoutMs = parseDuration(options.dependencyTimeout);
      if (dependencyTimeoutMs === undefined) {
        throw new ConfigError(`--dependency-timeout must be a duration, got "${options.dependencyTimeout}"`);
      }
    }

    const orchestrator = createOrchestrator({
      deployment,
      runtime: new DockerRuntime({ project: deployment.project }),
      backoff: config.backoff,
      dependencyTimeoutMs,
    });

    orchestrator
      .on('health', (service, health) => logger.info({ service, health }, 'Health changed'))
      .on('dependency-failed', (service, error) => logger.error({ service, err: error }, 'Start blocked'))
      .on('failure', (service, error) => logger.error({ service, err: error }, 'Service failed'));

    await supervise(orchestrator, { statusPort: options.status ? config.statusPort : null });
  });

program
  .command('down')
  .description('stop every service and remove its networks')
  .option('-v, --volumes', 'also remove named volumes')
  .action(async (options: { volumes?: boolean }) => {
    const config = resolveConfig(program.opts<GlobalOptions>());
    const deployment = await loadDeployment(config);
    const orchestrator = createOrchestrator({
      deployment,
      runtime: new DockerRuntime({ project: deployment.project }),
    });
    await orchestrator.down({ volumes: options.volumes ?? false });
  });

program.parseAsync().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error({ err: error }, message);
  process.exitCode = 1;
});
