import { describe, it, expect } from 'vitest';
import { handleStatusRequest } from '../src/healthcheck';
import type { StatusSnapshot } from '../src/orchestrator';

const source = (healthy: boolean) => {
  const snapshot: StatusSnapshot = {
    project: 'shop',
    healthy,
    timestamp: 1_700_000_000_000,
    batches: [['db']],
    services: {},
  };
  return { snapshot, getStatus: () => snapshot };
};

describe('handleStatusRequest', () => {
  it('should answer 200 with the snapshot when healthy', () => {
    const healthy = source(true);

    const response = handleStatusRequest(healthy, 'GET', '/health');

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body ?? '')).toEqual(healthy.snapshot);
  });

  it('should answer 503 with the snapshot when not healthy', () => {
    const response = handleStatusRequest(source(false), 'GET', '/health');

    expect(response.statusCode).toBe(503);
    expect(JSON.parse(response.body ?? '').healthy).toBe(false);
  });

  it('should answer 404 for other paths and methods', () => {
    expect(handleStatusRequest(source(true), 'GET', '/metrics')).toEqual({ statusCode: 404 });
    expect(handleStatusRequest(source(true), 'POST', '/health')).toEqual({ statusCode: 404 });
  });
});
