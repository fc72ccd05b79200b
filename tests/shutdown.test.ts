import { vi, describe, it, expect, afterEach } from 'vitest';
import { SIGINT, SIGTERM, setupShutdownHandlers } from '../src/shutdown';
import { flush } from './support/fake-runtime';

describe('setupShutdownHandlers', () => {
  let unregister: (() => void) | undefined;

  afterEach(() => {
    unregister?.();
    unregister = undefined;
  });

  it('should run the callback and exit with 0 on SIGTERM', async () => {
    const exit = vi.fn();
    const onShutdown = vi.fn(async () => undefined);
    unregister = setupShutdownHandlers(onShutdown, { exit });

    process.emit('SIGTERM', 'SIGTERM');
    await flush();

    expect(onShutdown).toHaveBeenCalledWith(SIGTERM);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('should pass SIGINT through', async () => {
    const exit = vi.fn();
    const onShutdown = vi.fn(async () => undefined);
    unregister = setupShutdownHandlers(onShutdown, { exit });

    process.emit('SIGINT', 'SIGINT');
    await flush();

    expect(onShutdown).toHaveBeenCalledWith(SIGINT);
  });

  it('should exit with 1 when the callback fails', async () => {
    const exit = vi.fn();
    unregister = setupShutdownHandlers(async () => {
      throw new Error('teardown failed');
    }, { exit });

    process.emit('SIGTERM', 'SIGTERM');
    await flush();

    expect(exit).toHaveBeenCalledWith(1);
  });

  it('should exit with 1 on a second signal during cleanup', async () => {
    const exit = vi.fn();
    unregister = setupShutdownHandlers(() => new Promise<void>(() => undefined), { exit });

    process.emit('SIGTERM', 'SIGTERM');
    process.emit('SIGINT', 'SIGINT');
    await flush();

    expect(exit).toHaveBeenCalledOnce();
    expect(exit).toHaveBeenCalledWith(1);
  });

  it('should stop listening once unregistered', async () => {
    const exit = vi.fn();
    const before = process.listenerCount('SIGTERM');
    setupShutdownHandlers(undefined, { exit })();

    expect(process.listenerCount('SIGTERM')).toBe(before);
  });
});
