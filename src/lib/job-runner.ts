import PQueue from 'p-queue';
import { Errors, errorMessage } from './errors.js';
import type { JobIdFactory, JobRegistry } from './job-registry.js';
import type { JobRunnerStats, SummarizeResult } from '../types/index.js';
import type { Logger } from '../config.js';

export interface JobRunnerOptions {
  /** Jobs executed at the same time */
  concurrency: number;
  /** Jobs allowed to wait for a slot before submissions are refused */
  maxPendingJobs: number;
}

export type JobWork = () => Promise<SummarizeResult>;

/**
 * Runs background jobs on their own bounded queue and records
 * their outcome in the registry.
 */
export class JobRunner {
  private queue: PQueue;
  private options: JobRunnerOptions;
  private registry: JobRegistry;
  private nextId: JobIdFactory;
  private logger: Logger;

  constructor(options: JobRunnerOptions, registry: JobRegistry, nextId: JobIdFactory, logger: Logger) {
    this.options = options;
    this.registry = registry;
    this.nextId = nextId;
    this.logger = logger;
    this.queue = new PQueue({ concurrency: options.concurrency });
  }

  /**
   * Register a pending job and schedule its work
   *
   * @returns the job id, already visible in the registry as pending
   * @throws ApiError server_busy when the job queue is full
   */
  submit(work: JobWork, label: string): string {
    if (this.queue.size >= this.options.maxPendingJobs) {
      this.logger.warn('Job queue full, rejecting submission', {
        waiting: this.queue.size,
        maxPendingJobs: this.options.maxPendingJobs,
      });
      throw Errors.serverBusy();
    }

    const jobId = this.nextId();
    this.registry.insert(jobId, { status: 'pending' });
    this.logger.info('Job submitted', { jobId, kind: label });

    void this.queue.add(() => this.execute(jobId, work)).catch((error: unknown) => {
      this.logger.error('Job execution failed unexpectedly', { jobId, error: errorMessage(error) });
      this.registry.complete(jobId, { status: 'error', error: errorMessage(error) });
    });

    return jobId;
  }

  /**
   * Execute a job; every failure ends up in the registry as an error state
   */
  private async execute(jobId: string, work: JobWork): Promise<void> {
    const startedAt = Date.now();
    this.logger.debug('Job started', { jobId });

    try {
      const result = await work();
      this.registry.complete(jobId, { status: 'done', result });
      this.logger.info('Job completed', { jobId, durationMs: Date.now() - startedAt });
    } catch (error) {
      const message = errorMessage(error);
      this.registry.complete(jobId, { status: 'error', error: message });
      this.logger.info('Job failed', { jobId, error: message, durationMs: Date.now() - startedAt });
    }
  }

  getStats(): JobRunnerStats {
    return {
      waiting: this.queue.size,
      running: this.queue.pending,
      tracked: this.registry.size,
    };
  }

  /**
   * Resolves once every submitted job has finished
   */
  async onIdle(): Promise<void> {
    await this.queue.onIdle();
  }
}
