import { describe, it, expect } from 'vitest';
import { DEFAULT_STATUS_PORT, loadConfig } from '../src/config';
import { formatDuration, parseDuration } from '../src/duration';
import { ConfigError } from '../src/errors';
import { DEFAULT_BACKOFF } from '../src/restart-policy';

describe('loadConfig', () => {
  it('should fall back to defaults with an empty environment', () => {
    expect(loadConfig({})).toEqual({
      file: 'docker-compose.yaml',
      project: undefined,
      statusPort: DEFAULT_STATUS_PORT,
      dependencyTimeoutMs: undefined,
      backoff: DEFAULT_BACKOFF,
    });
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      STACKGATE_FILE: 'stack.yaml',
      STACKGATE_PROJECT: 'shop',
      STACKGATE_STATUS_PORT: '8081',
      STACKGATE_DEPENDENCY_TIMEOUT: '2m',
      STACKGATE_BACKOFF_INITIAL: '250ms',
      STACKGATE_BACKOFF_MAX: '30s',
    });

    expect(config).toEqual({
      file: 'stack.yaml',
      project: 'shop',
      statusPort: 8081,
      dependencyTimeoutMs: 120_000,
      backoff: { ...DEFAULT_BACKOFF, initialDelayMs: 250, maxDelayMs: 30_000 },
    });
  });

  it('should treat empty values as unset', () => {
    const config = loadConfig({ STACKGATE_STATUS_PORT: '', STACKGATE_DEPENDENCY_TIMEOUT: '' });

    expect(config.statusPort).toBe(3000);
    expect(config.dependencyTimeoutMs).toBeUndefined();
  });

  it('should reject a malformed duration', () => {
    expect(() => loadConfig({ STACKGATE_DEPENDENCY_TIMEOUT: 'soon' })).toThrow(ConfigError);
    expect(() => loadConfig({ STACKGATE_DEPENDENCY_TIMEOUT: 'soon' })).toThrow(
      'STACKGATE_DEPENDENCY_TIMEOUT must be a duration such as 30s or 2m, got "soon"'
    );
  });

  it('should reject an out-of-range port', () => {
    expect(() => loadConfig({ STACKGATE_STATUS_PORT: '70000' })).toThrow(
      'STACKGATE_STATUS_PORT must be a port number, got "70000"'
    );
  });
});

describe('parseDuration', () => {
  it('should parse single and compound durations', () => {
    expect(parseDuration('10s')).toBe(10_000);
    expect(parseDuration('500ms')).toBe(500);
    expect(parseDuration('1m30s')).toBe(90_000);
    expect(parseDuration('1h')).toBe(3_600_000);
    expect(parseDuration('1.5s')).toBe(1_500);
    expect(parseDuration(' 5s ')).toBe(5_000);
  });

  it('should return undefined for text that is not a duration', () => {
    expect(parseDuration('')).toBeUndefined();
    expect(parseDuration('10')).toBeUndefined();
    expect(parseDuration('10x')).toBeUndefined();
    expect(parseDuration('s10')).toBeUndefined();
    expect(parseDuration('1m 30s')).toBeUndefined();
  });
});

describe('formatDuration', () => {
  it('should pick the largest whole unit', () => {
    expect(formatDuration(7_200_000)).toBe('2h');
    expect(formatDuration(120_000)).toBe('2m');
    expect(formatDuration(10_000)).toBe('10s');
    expect(formatDuration(1_500)).toBe('1500ms');
    expect(formatDuration(0)).toBe('0ms');
  });
});
