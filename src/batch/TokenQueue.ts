import { logger } from '../utils/logger';
import { errorMessage } from '../artifacts/core/errors';

export interface QueueOutcome<J, R> {
  job: J;
  result?: R;
  error?: string;
}

/**
 * TokenQueue - Runs token jobs with a concurrency limit
 * The limit is shared by every batch submitted to the same queue; a failed
 * job is recorded and never stops the others.
 */
export class TokenQueue {
  private readonly maxConcurrent: number;
  private active = 0;
  private waiting: Array<() => void> = [];
  private stopped = false;

  constructor(maxConcurrent: number = 2) {
    this.maxConcurrent = Math.max(1, maxConcurrent);
    logger.debug('🎯 TokenQueue initialized', { maxConcurrent: this.maxConcurrent });
  }

  /**
   * Run every job, outcomes in submission order
   */
  async run<J, R>(
    jobs: J[],
    worker: (job: J) => Promise<R>,
  ): Promise<QueueOutcome<J, R>[]> {
    return Promise.all(
      jobs.map(async (job): Promise<QueueOutcome<J, R>> => {
        try {
          const result = await this.schedule(() => worker(job));
          return { job, result };
        } catch (error: unknown) {
          logger.error('Failed to process job', { job, error: errorMessage(error) });
          return { job, error: errorMessage(error) };
        }
      }),
    );
  }

  /**
   * Wait for a free slot, then run the task
   */
  private async schedule<R>(task: () => Promise<R>): Promise<R> {
    await this.acquire();
    try {
      if (this.stopped) {
        throw new Error('Queue stopped before the job started');
      }
      return await task();
    } finally {
      this.release();
    }
  }

  private async acquire(): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.active++;
      return;
    }
    // The slot is handed over by release(), active stays unchanged
    await new Promise<void>((resolve) => this.waiting.push(resolve));
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.active--;
    }
  }

  /**
   * Get number of jobs being processed
   */
  getProcessingCount(): number {
    return this.active;
  }

  /**
   * Get number of jobs waiting for a slot
   */
  getQueueLength(): number {
    return this.waiting.length;
  }

  /**
   * Stop queue processing: waiting jobs fail, running jobs finish
   */
  stop(): void {
    if (this.active > 0 || this.waiting.length > 0) {
      logger.info('🛑 Stopping TokenQueue', {
        queued: this.waiting.length,
        processing: this.active,
      });
    }
    this.stopped = true;
  }
}
