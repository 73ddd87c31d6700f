import { Router, readJsonBody, type RequestContext } from '../lib/router.js';
import { jsonResponse } from '../lib/response.js';
import { parseSummarizeRequest, type SummaryService } from '../lib/summary-service.js';
import type { Logger } from '../config.js';

/**
 * Create API router with the synchronous summary and model listing endpoints
 */
export function createApiRouter(summaryService: SummaryService, logger: Logger): Router {
  const router = new Router();

  /**
   * GET /api/models
   * Installed model names; an empty list when the backend cannot be reached
   */
  router.get('/api/models', async () => {
    const models = await summaryService.listModels();
    return jsonResponse(200, models);
  });

  /**
   * POST /api/summarize
   * Fetch the transcript and generate the summary while the connection waits
   */
  router.post('/api/summarize', async (ctx: RequestContext) => {
    const request = parseSummarizeRequest(await readJsonBody(ctx));

    logger.info('Received summarize request', {
      requestId: ctx.requestId,
      dryRun: request.dry_run,
      transcriptOnly: request.transcript_only,
      model: request.model,
    });

    const result = await summaryService.summarize(request);
    return jsonResponse(200, result);
  });

  return router;
}
