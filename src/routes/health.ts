import { Router } from '../lib/router.js';
import { jsonResponse } from '../lib/response.js';
import type { HealthResponse, ConnectionWorkItem } from '../types/index.js';
import type { WorkerPool } from '../lib/worker-pool.js';
import type { JobRunner } from '../lib/job-runner.js';

// Track server start time
const startTime = Date.now();

/**
 * Create health router with worker pool and job runner access
 */
export function createHealthRouter(workerPool: WorkerPool<ConnectionWorkItem>, jobRunner: JobRunner): Router {
  const router = new Router();

  /**
   * GET /health
   * Returns server health status.
   */
  router.get('/health', () => {
    const uptimeSeconds = Math.floor((Date.now() - startTime) / 1000);
    const stats = workerPool.getStats();

    const response: HealthResponse = {
      status: workerPool.isHealthy() ? 'ok' : 'degraded',
      uptime: uptimeSeconds,
      queue: {
        queued: stats.queued,
        processing: stats.processing,
        concurrency: stats.concurrency,
      },
      jobs: jobRunner.getStats(),
    };

    return jsonResponse(200, response);
  });

  return router;
}
