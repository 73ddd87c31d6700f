import { DispatchServer } from './lib/server.js';
import { Router } from './lib/router.js';
import { JobRunner } from './lib/job-runner.js';
import { InMemoryJobRegistry, createJobIdFactory, type JobIdFactory } from './lib/job-registry.js';
import { SummaryService, loadPrompt } from './lib/summary-service.js';
import { StaticAssets } from './lib/static-assets.js';
import { createApiRouter } from './routes/api.js';
import { createJobsRouter } from './routes/jobs.js';
import { createHealthRouter } from './routes/health.js';
import { createStaticRouter } from './routes/static.js';
import type { CompletionBackend, TranscriptSource } from './types/index.js';
import type { Config, Logger } from './config.js';

export interface AppDependencies {
  transcripts: TranscriptSource;
  backend: CompletionBackend;
  /** Defaults to job-<epoch ms>-<counter> ids */
  nextJobId?: JobIdFactory;
}

export interface App {
  server: DispatchServer;
  registry: InMemoryJobRegistry;
  jobRunner: JobRunner;
}

/**
 * Wire collaborators, job machinery and routes into a server that is ready to listen
 */
export function createApp(config: Config, deps: AppDependencies, logger: Logger): App {
  const registry = new InMemoryJobRegistry(
    { ttlMs: config.jobTtlMs, cleanupIntervalMs: config.jobCleanupIntervalMs },
    logger
  );
  const jobRunner = new JobRunner(
    { concurrency: config.jobConcurrency, maxPendingJobs: config.maxPendingJobs },
    registry,
    deps.nextJobId ?? createJobIdFactory(),
    logger
  );

  const summaryService = new SummaryService(
    deps.transcripts,
    deps.backend,
    {
      defaultModel: config.defaultModel,
      defaultLanguage: config.transcriptLanguage,
      defaultSystemPrompt: loadPrompt('summarize-system.md'),
      dryRunSample: loadPrompt('dry-run.md'),
      completion: {
        temperature: config.temperature,
        repeatPenalty: config.repeatPenalty,
        contextSize: config.contextSize,
        maxTokensPerTurn: config.maxTokensPerTurn,
        maxContinuations: config.maxContinuations,
      },
    },
    logger
  );

  const router = new Router();
  const server = new DispatchServer(config, router, logger);

  router
    .use(createStaticRouter(new StaticAssets()))
    .use(createHealthRouter(server.pool, jobRunner))
    .use(createApiRouter(summaryService, logger))
    .use(createJobsRouter(jobRunner, registry, summaryService, logger));

  return { server, registry, jobRunner };
}
