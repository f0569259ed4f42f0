import { JobStore } from './types/job.store.js';
import { JobCompleter } from './job.completer.js';
import { Nullable } from './util/util.types.js';
import { ValidationException } from './exceptions/validation.exception.js';
import { logger } from './logger/logger.settings.js';

export interface SchedulerOptions {
  interval: number;
  limit: number;
}

export const DEFAULT_SCHEDULER_OPTIONS: SchedulerOptions = {
  interval: 1000,
  limit: 1000,
};

/**
 * Moves failed jobs whose retry time has come back to the queue.
 */
export class Scheduler {
  private schedulerTimer: Nullable<NodeJS.Timeout> = null;
  private options: SchedulerOptions;

  constructor(
    private store: JobStore,
    private completer: JobCompleter,
    options: Partial<SchedulerOptions> = {},
  ) {
    this.options = { ...DEFAULT_SCHEDULER_OPTIONS, ...options };

    if (this.options.interval <= 0) {
      throw new ValidationException('Interval is less or equal to 0');
    }

    if (this.options.limit <= 0) {
      throw new ValidationException('Limit is less or equal to 0');
    }
  }

  start() {
    logger.info('Starting scheduler');
    if (!this.schedulerTimer) {
      this.schedulerTimer = setInterval(() => {
        this.runOnce().catch((error: unknown) =>
          logger.error('Failed to schedule retries: ', error),
        );
      }, this.options.interval);
    }
  }

  stop() {
    logger.info(`Stopping scheduler`);
    if (this.schedulerTimer) {
      clearInterval(this.schedulerTimer);
      this.schedulerTimer = null;
    }
  }

  async runOnce(): Promise<number> {
    const dueJobs = await this.store.findDueRetries(this.options.limit);
    let numberOfScheduled = 0;

    for (const job of dueJobs) {
      const requeued = await this.completer.complete(
        { completeDuration: 0, queueWaitDuration: 0, runDuration: 0 },
        {
          id: job.id,
          from: ['failed'],
          to: 'queued',
          statusMessage: `Queued for retry ${job.retryCount + 1} of ${job.maxRetries}`,
          incrementRetryCount: true,
          retryDue: true,
          expectedRetryCount: job.retryCount,
        },
      );
      if (requeued) {
        numberOfScheduled++;
      }
    }

    logger.trace(`Scheduled number of jobs: ${numberOfScheduled}`);
    return numberOfScheduled;
  }
}
