import http from 'node:http';
import type { MetricsCollector } from './collector.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('metrics');

/**
 * Standalone listener that serves `GET /metrics` and nothing else.
 */
export function createMetricsServer(metrics: MetricsCollector): http.Server {
  return http.createServer((req, res) => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    if (req.method !== 'GET' || url.pathname !== '/metrics') {
      res.writeHead(404, { 'Content-Type': 'text/plain' });
      res.end('Not found\n');
      return;
    }

    metrics.render().then(
      body => {
        res.writeHead(200, { 'Content-Type': metrics.contentType });
        res.end(body);
      },
      (err: unknown) => {
        log.error('Failed to render metrics', err);
        res.writeHead(500, { 'Content-Type': 'text/plain' });
        res.end('Metrics unavailable\n');
      },
    );
  });
}
