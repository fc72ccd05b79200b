import http from 'node:http';
import { promisify } from 'node:util';
import { DEFAULT_STATUS_PORT } from './config';
import logger from './logger';
import type { StatusSnapshot } from './orchestrator';

/**
 * Anything that can report a deployment status snapshot.
 */
export interface StatusSource {
  getStatus(): StatusSnapshot;
}

/**
 * Status information for the status server.
 */
export interface StatusServerState {
  listening: boolean;
  port: number;
}

/**
 * Service handle for the status server.
 */
export interface StatusServer {
  status(): StatusServerState;
  close(): Promise<void>;
}

/**
 * Map a request to status code and body. Kept apart from the server so it
 * can be exercised without a socket.
 */
export const handleStatusRequest = (
  source: StatusSource,
  method: string | undefined,
  url: string | undefined
): { statusCode: number; body?: string } => {
  if (url !== '/health' || method !== 'GET') {
    return { statusCode: 404 };
  }

  const snapshot = source.getStatus();
  return {
    statusCode: snapshot.healthy ? 200 : 503,
    body: JSON.stringify(snapshot),
  };
};

/**
 * Start an HTTP status server for the orchestrator.
 *
 * Endpoint: GET /health
 * - 200 with the status snapshot when every service runs and every probed
 *   service is healthy
 * - 503 with the same snapshot otherwise
 *
 * Other endpoints return 404.
 */
export const startStatusServer = (source: StatusSource, port = DEFAULT_STATUS_PORT): StatusServer => {
  const server = http.createServer((req, res) => {
    try {
      const { statusCode, body } = handleStatusRequest(source, req.method, req.url);
      if (body === undefined) {
        res.writeHead(statusCode);
        res.end();
        return;
      }
      res.writeHead(statusCode, { 'Content-Type': 'application/json' });
      res.end(body);
    } catch (err) {
      logger.error({ err }, 'Error building status response');
      res.writeHead(503, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ healthy: false, error: 'Failed to get deployment status' }));
    }
  });

  server.listen(port, () => {
    logger.info({ port }, 'Status server listening');
  });

  return {
    close: promisify(server.close.bind(server)),

    status: (): StatusServerState => ({
      listening: server.listening,
      port,
    }),
  };
};
