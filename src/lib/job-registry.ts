import type { JobState, TerminalJobState } from '../types/index.js';
import type { Logger } from '../config.js';

/**
 * Storage for job lifecycle state
 */
export interface JobRegistry {
  get(id: string): JobState | undefined;
  /** Register a new id; ids are never reused */
  insert(id: string, state: JobState): void;
  /**
   * Move a pending job to a terminal state.
   * Returns false (and changes nothing) if the job is unknown or already terminal.
   */
  complete(id: string, state: TerminalJobState): boolean;
  readonly size: number;
}

export type JobIdFactory = () => string;

/**
 * Ids of the form job-<epoch ms>-<counter>. The counter alone guarantees
 * uniqueness within a process; the timestamp is for tracing.
 */
export function createJobIdFactory(now: () => number = Date.now): JobIdFactory {
  let counter = 0;
  return () => {
    counter += 1;
    return `job-${now()}-${counter}`;
  };
}

interface JobEntry {
  state: JobState;
  completedAt?: number;
}

export interface InMemoryJobRegistryOptions {
  /** How long a terminal job stays pollable */
  ttlMs: number;
  /** How often expired jobs are swept */
  cleanupIntervalMs: number;
  now?: () => number;
}

/**
 * Map-backed registry with TTL cleanup of finished jobs.
 * Pending jobs are never expired.
 */
export class InMemoryJobRegistry implements JobRegistry {
  private jobs = new Map<string, JobEntry>();
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;
  private options: InMemoryJobRegistryOptions;
  private logger: Logger;
  private now: () => number;

  constructor(options: InMemoryJobRegistryOptions, logger: Logger) {
    this.options = options;
    this.logger = logger;
    this.now = options.now ?? Date.now;
  }

  get(id: string): JobState | undefined {
    return this.jobs.get(id)?.state;
  }

  insert(id: string, state: JobState): void {
    if (this.jobs.has(id)) {
      throw new Error(`Job id already registered: ${id}`);
    }
    this.jobs.set(id, {
      state,
      completedAt: state.status === 'pending' ? undefined : this.now(),
    });
  }

  complete(id: string, state: TerminalJobState): boolean {
    const entry = this.jobs.get(id);
    if (!entry || entry.state.status !== 'pending') {
      this.logger.warn('Ignoring completion for job that is not pending', {
        jobId: id,
        current: entry?.state.status ?? 'unknown',
      });
      return false;
    }

    this.jobs.set(id, { state, completedAt: this.now() });
    return true;
  }

  get size(): number {
    return this.jobs.size;
  }

  /**
   * Start the cleanup timer for expired jobs
   */
  startCleanup(): void {
    if (this.cleanupTimer) return;

    this.cleanupTimer = setInterval(() => {
      this.cleanupExpiredJobs();
    }, this.options.cleanupIntervalMs);
    this.cleanupTimer.unref();

    this.logger.info('Job cleanup timer started', {
      intervalMs: this.options.cleanupIntervalMs,
      ttlMs: this.options.ttlMs,
    });
  }

  /**
   * Stop the cleanup timer
   */
  stopCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
      this.logger.info('Job cleanup timer stopped');
    }
  }

  /**
   * Delete terminal jobs older than the TTL
   *
   * @returns number of jobs removed
   */
  cleanupExpiredJobs(): number {
    const cutoff = this.now() - this.options.ttlMs;
    let removed = 0;

    for (const [id, entry] of this.jobs) {
      if (entry.completedAt !== undefined && entry.completedAt < cutoff) {
        this.jobs.delete(id);
        removed++;
      }
    }

    if (removed > 0) {
      this.logger.info('Expired jobs cleaned up', { count: removed });
    }
    return removed;
  }
}
