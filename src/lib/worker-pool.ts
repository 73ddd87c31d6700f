import PQueue from 'p-queue';
import { errorMessage } from './errors.js';
import type { DispatchResult, WorkerPoolStats } from '../types/index.js';
import type { Logger } from '../config.js';

export interface WorkerPoolOptions {
  /** Number of items processed concurrently */
  concurrency: number;
  /** Maximum items waiting for a worker */
  maxQueueSize: number;
}

/**
 * Processes one work item to completion, including its response.
 * Must not throw; anything it does throw is logged and dropped.
 */
export type WorkItemProcessor<T> = (item: T) => Promise<void>;

/**
 * Fixed-size worker pool in front of a bounded FIFO queue,
 * using p-queue for concurrency control.
 *
 * Admission never waits: a full queue is reported back to the caller,
 * which is expected to turn the item away itself.
 */
export class WorkerPool<T> {
  private queue: PQueue;
  private options: WorkerPoolOptions;
  private processor: WorkItemProcessor<T>;
  private logger: Logger;
  private isShuttingDown = false;
  private onDropped: ((item: T) => void) | null = null;
  private waiting = new Set<T>();

  constructor(options: WorkerPoolOptions, processor: WorkItemProcessor<T>, logger: Logger) {
    this.options = options;
    this.processor = processor;
    this.logger = logger;

    this.queue = new PQueue({ concurrency: options.concurrency });

    this.logger.info('Worker pool initialized', {
      concurrency: options.concurrency,
      maxQueueSize: options.maxQueueSize,
    });
  }

  /**
   * Try to hand an item to the pool without waiting
   *
   * @returns 'queued' when accepted, 'full' when the queue is at capacity,
   *   'closed' when the pool no longer takes work
   */
  dispatch(item: T): DispatchResult {
    if (this.isShuttingDown) {
      return 'closed';
    }

    if (this.queue.size >= this.options.maxQueueSize) {
      this.logger.warn('Queue capacity exceeded, rejecting work item', {
        queueSize: this.queue.size,
        maxQueueSize: this.options.maxQueueSize,
      });
      return 'full';
    }

    this.waiting.add(item);
    void this.queue
      .add(async () => {
        this.waiting.delete(item);
        await this.processor(item);
      })
      .catch((error: unknown) => {
        this.logger.error('Work item processor failed unexpectedly', {
          error: errorMessage(error),
        });
      });

    return 'queued';
  }

  /**
   * Register a callback for items that were queued but never started
   * because the pool shut down
   */
  setDroppedHandler(handler: (item: T) => void): void {
    this.onDropped = handler;
  }

  /**
   * Get current worker pool statistics
   */
  getStats(): WorkerPoolStats {
    return {
      queued: this.queue.size,
      processing: this.queue.pending, // p-queue: pending = currently running
      concurrency: this.options.concurrency,
      maxQueueSize: this.options.maxQueueSize,
      isPaused: this.queue.isPaused,
    };
  }

  /**
   * Get number of items waiting for a worker
   */
  get size(): number {
    return this.queue.size;
  }

  /**
   * Get number of items currently being processed
   */
  get pending(): number {
    return this.queue.pending;
  }

  /**
   * Check if the pool is healthy (not at capacity)
   */
  isHealthy(): boolean {
    return this.queue.size < this.options.maxQueueSize * 0.9; // 90% threshold
  }

  /**
   * Gracefully shutdown the worker pool
   * - Stop accepting new items
   * - Hand waiting items to the dropped handler
   * - Wait for running items to complete
   */
  async shutdown(): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;

    this.logger.info('Shutting down worker pool', {
      pending: this.queue.pending,
      size: this.queue.size,
    });

    // Pause the queue to stop processing new items
    this.queue.pause();

    // Clear waiting items (they haven't started yet)
    this.queue.clear();
    const dropped = [...this.waiting];
    this.waiting.clear();
    for (const item of dropped) {
      this.onDropped?.(item);
    }

    // Wait for currently running items to complete
    if (this.queue.pending > 0) {
      await this.queue.onIdle();
    }

    this.logger.info('Worker pool shutdown complete');
  }
}
