import http from 'http';
import { errorMessage } from './errors.js';
import type { StatsSnapshot } from './gateway.js';
import { createLogger } from './log.js';

const log = createLogger('http');

export interface HealthServerConfig {
  host?: string;
  port: number;
}

export type SnapshotSource = () => StatsSnapshot;

export function healthBody(snapshot: StatsSnapshot): { status: 'ok' | 'degraded'; ingest: string; uptimeSeconds: number; stats: Record<string, number> } {
  const { ingest, uptimeSeconds, ...stats } = snapshot;
  return { status: ingest === 'subscribed' ? 'ok' : 'degraded', ingest, uptimeSeconds, stats };
}

/** Read-only liveness endpoint. Port 0 picks a free port. */
export function startHealthServer(snapshot: SnapshotSource, { host = '0.0.0.0', port }: HealthServerConfig): http.Server {
  const server = http.createServer((req, res) => {
    try {
      if (req.method !== 'GET') {
        res.statusCode = 405;
        res.setHeader('Allow', 'GET');
        res.end('method not allowed');
        return;
      }

      const path = (req.url ?? '').split('?')[0];
      if (path === '/health') {
        res.statusCode = 200;
        res.setHeader('Content-Type', 'application/json');
        res.end(JSON.stringify(healthBody(snapshot())));
        return;
      }

      res.statusCode = 404;
      res.end('not found');
    } catch (e) {
      res.statusCode = 500;
      res.end(`server error: ${errorMessage(e)}`);
    }
  });

  server.listen(port, host, () => {
    log.info(`health endpoint listening on http://${host}:${port}/health`);
  });

  server.on('error', (err) => {
    log.error(`http error: ${err.message}`);
  });

  return server;
}
