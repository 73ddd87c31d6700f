import { Router, readJsonBody, type RequestContext } from '../lib/router.js';
import { jsonResponse } from '../lib/response.js';
import { Errors } from '../lib/errors.js';
import { parseSummarizeRequest, type SummaryService } from '../lib/summary-service.js';
import type { JobRunner } from '../lib/job-runner.js';
import type { JobRegistry } from '../lib/job-registry.js';
import type { SummarizeRequest } from '../types/index.js';
import type { Logger } from '../config.js';

/**
 * Create jobs router for background summary execution
 */
export function createJobsRouter(
  jobRunner: JobRunner,
  registry: JobRegistry,
  summaryService: SummaryService,
  logger: Logger
): Router {
  const router = new Router();

  const submit = async (ctx: RequestContext, kind: 'summary' | 'script') => {
    const parsed = parseSummarizeRequest(await readJsonBody(ctx));
    const request: SummarizeRequest = kind === 'script' ? { ...parsed, transcript_only: true } : parsed;

    const jobId = jobRunner.submit(() => summaryService.summarize(request), kind);
    logger.debug('Job accepted', { requestId: ctx.requestId, jobId });

    // Return immediately with 202 Accepted
    return jsonResponse(202, { job_id: jobId });
  };

  /**
   * POST /api/submit
   * Queue a full summary job
   */
  router.post('/api/submit', (ctx) => submit(ctx, 'summary'));

  /**
   * POST /api/submit_script
   * Queue a transcript-only job
   */
  router.post('/api/submit_script', (ctx) => submit(ctx, 'script'));

  /**
   * GET /api/job?id=<id>
   * Current state of a job
   */
  router.get('/api/job', (ctx) => {
    const jobId = ctx.head.query.get('id') || ctx.head.query.get('job_id');
    if (!jobId) {
      throw Errors.jobIdRequired();
    }

    const state = registry.get(jobId);
    if (!state) {
      return jsonResponse(404, { status: 'error', error: 'not_found' });
    }
    return jsonResponse(200, state);
  });

  return router;
}
