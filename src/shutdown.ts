import logger from './logger';

/**
 * Signal constants for graceful shutdown.
 */
export const SIGTERM = Symbol('SIGTERM');
export const SIGINT = Symbol('SIGINT');

/**
 * Type representing a graceful shutdown signal.
 */
export type ShutdownSignal = typeof SIGTERM | typeof SIGINT;

/**
 * Cleanup to run before exit, typically tearing the deployment down.
 */
export type OnShutdownCallback = (signal: ShutdownSignal) => Promise<void>;

export interface ShutdownOptions {
  /** Process exit hook; replaced in tests. */
  exit?: (code: number) => void;
}

/**
 * Register SIGTERM and SIGINT handlers.
 *
 * On the first signal the callback runs and the process exits with 0, or 1
 * if the callback failed. A second signal while cleanup is still running
 * exits immediately with 1. Returns a function that removes the handlers.
 */
export const setupShutdownHandlers = (
  onShutdown?: OnShutdownCallback,
  options: ShutdownOptions = {}
): (() => void) => {
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let shuttingDown = false;

  const handleSignal = (nodeSignal: NodeJS.Signals, shutdownSignal: ShutdownSignal) => {
    return async () => {
      if (shuttingDown) {
        logger.warn({ signal: nodeSignal }, 'Second signal received, exiting without cleanup');
        exit(1);
        return;
      }
      shuttingDown = true;
      logger.info({ signal: nodeSignal }, 'Signal received, tearing down');

      let code = 0;
      try {
        if (onShutdown) await onShutdown(shutdownSignal);
      } catch (error) {
        code = 1;
        logger.error({ err: error, signal: nodeSignal }, 'Error during shutdown');
      }

      exit(code);
    };
  };

  const onTerm = handleSignal('SIGTERM', SIGTERM);
  const onInt = handleSignal('SIGINT', SIGINT);
  process.on('SIGTERM', onTerm);
  process.on('SIGINT', onInt);

  return () => {
    process.off('SIGTERM', onTerm);
    process.off('SIGINT', onInt);
  };
};
