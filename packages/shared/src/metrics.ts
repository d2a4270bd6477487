/**
 * Prometheus Metrics
 *
 * Parse throughput, per-method outcomes and vision request latency.
 */

import http from 'node:http';
import * as promClient from 'prom-client';
import { logger } from './logger';

export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Job Processing Metrics
// ============================================================================

export const jobDurationHistogram = new promClient.Histogram({
  name: 'payverify_job_duration_seconds',
  help: 'Duration of job processing in seconds',
  labelNames: ['queue', 'status'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

export const jobsProcessedCounter = new promClient.Counter({
  name: 'payverify_jobs_processed_total',
  help: 'Total number of jobs processed',
  labelNames: ['queue', 'status'],
  registers: [register],
});

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const documentsParsedCounter = new promClient.Counter({
  name: 'payverify_documents_parsed_total',
  help: 'Documents run through the extraction pipeline',
  labelNames: ['document_type', 'status'],
  registers: [register],
});

export const methodAttemptsCounter = new promClient.Counter({
  name: 'payverify_method_attempts_total',
  help: 'Extraction method attempts by outcome',
  labelNames: ['method', 'outcome'],
  registers: [register],
});

export const parseDurationHistogram = new promClient.Histogram({
  name: 'payverify_parse_duration_seconds',
  help: 'Duration of a single document parse',
  labelNames: ['document_type'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [register],
});

export const visionRequestsCounter = new promClient.Counter({
  name: 'payverify_vision_requests_total',
  help: 'Total number of visual analysis requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const visionRequestDurationHistogram = new promClient.Histogram({
  name: 'payverify_vision_request_duration_seconds',
  help: 'Duration of visual analysis requests',
  labelNames: ['model'],
  buckets: [1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Start a minimal HTTP server for /metrics (for worker processes).
 */
export function serveMetrics(port: number): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url === '/metrics' && req.method === 'GET') {
      getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', getMetricsContentType());
          res.end(body);
        })
        .catch((err: unknown) => {
          logger.error('Metrics collection failed', err);
          res.statusCode = 500;
          res.end();
        });
    } else {
      res.statusCode = 404;
      res.end();
    }
  });
  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });
  return server;
}
