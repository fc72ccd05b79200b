import { startStatusServer } from './healthcheck';
import type { StatusServer, StatusSource } from './healthcheck';
import type { OrchestratorInstance } from './orchestrator';
import { setupShutdownHandlers } from './shutdown';

export interface SuperviseOptions {
  /** Port of the status endpoint; null runs without it. */
  statusPort: number | null;
  startServer?: (source: StatusSource, port: number) => StatusServer;
  /** Passed on to the shutdown handlers. */
  exit?: (code: number) => void;
}

export interface Supervision {
  batches: string[][];
  /** Remove the signal handlers and close the status endpoint. */
  dispose(): Promise<void>;
}

/**
 * Bring a deployment up behind the status endpoint and signal handlers.
 *
 * If `up()` rejects (a resolver error, a network that cannot be created)
 * the handlers are removed and the endpoint closed before the error is
 * rethrown, so nothing keeps the process alive.
 */
export const supervise = async (
  orchestrator: OrchestratorInstance,
  options: SuperviseOptions
): Promise<Supervision> => {
  const startServer = options.startServer ?? startStatusServer;
  const statusServer = options.statusPort === null ? null : startServer(orchestrator, options.statusPort);

  const unregister = setupShutdownHandlers(
    async () => {
      await orchestrator.down();
      await statusServer?.close();
    },
    { exit: options.exit }
  );

  const dispose = async () => {
    unregister();
    await statusServer?.close();
  };

  try {
    const batches = await orchestrator.up();
    return { batches, dispose };
  } catch (err) {
    await dispose();
    throw err;
  }
};
