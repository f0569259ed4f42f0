import { Job, JobStatistics } from './types/job.js';
import { JobStore } from './types/job.store.js';
import { JobCompleter } from './job.completer.js';
import { ValidationException } from './exceptions/validation.exception.js';
import { Nullable } from './util/util.types.js';
import { logger } from './logger/logger.settings.js';

export interface JobRescuerOptions {
  interval: number;
  batchSize: number;
}

export const DEFAULT_JOB_RESCUER_OPTIONS: JobRescuerOptions = {
  interval: 60_000, // 1 minute
  batchSize: 1_000,
};

export interface JobRescuerResult {
  numJobsRequeued: number;
  numJobsFailed: number;
}

const LEASE_EXPIRED_MESSAGE = 'Worker lease expired before the job finished';

/**
 * Returns jobs whose worker stopped renewing them (crashed or was killed)
 * to the queue, or fails them when no retries remain.
 */
export class JobRescuer {
  private rescuerIntervalTimeout: Nullable<NodeJS.Timeout> = null;
  private options: JobRescuerOptions;

  constructor(
    private store: JobStore,
    private completer: JobCompleter,
    options: Partial<JobRescuerOptions> = {},
  ) {
    this.options = { ...DEFAULT_JOB_RESCUER_OPTIONS, ...options };

    if (this.options.interval <= 0) {
      throw new ValidationException('Interval is less then or equal to 0');
    }

    if (this.options.batchSize <= 0) {
      throw new ValidationException('BatchSize is equal or less then 0');
    }
  }

  start() {
    logger.info('Starting job rescuer');
    if (!this.rescuerIntervalTimeout) {
      this.rescuerIntervalTimeout = setInterval(() => {
        this.runOnce().catch((error: unknown) =>
          logger.error('Failed to rescue jobs: ', error),
        );
      }, this.options.interval);
    }
  }

  async runOnce(): Promise<JobRescuerResult> {
    const expiredJobs = await this.store.findExpiredLeases(
      this.options.batchSize,
    );
    let numJobsRequeued = 0;
    let numJobsFailed = 0;

    for (const job of expiredJobs) {
      if (job.retryCount < job.maxRetries) {
        if (await this.requeue(job)) {
          numJobsRequeued++;
        }
      } else if (await this.discard(job)) {
        numJobsFailed++;
      }
    }

    if (expiredJobs.length > 0) {
      logger.info(
        `Rescued jobs, requeued: ${numJobsRequeued}, failed: ${numJobsFailed}`,
      );
    }

    return { numJobsRequeued, numJobsFailed };
  }

  private async requeue(job: Job): Promise<boolean> {
    const updated = await this.completer.complete(this.emptyStats(), {
      id: job.id,
      from: ['processing'],
      to: 'queued',
      statusMessage: 'Requeued after lease expiry',
      error: {
        kind: 'lease_expired',
        message: LEASE_EXPIRED_MESSAGE,
        retryCount: job.retryCount,
      },
      incrementRetryCount: true,
      leaseExpired: true,
      expectedRetryCount: job.retryCount,
    });
    return updated !== null;
  }

  private async discard(job: Job): Promise<boolean> {
    const updated = await this.completer.complete(this.emptyStats(), {
      id: job.id,
      from: ['processing'],
      to: 'failed',
      statusMessage: 'Failed',
      error: {
        kind: 'lease_expired',
        message: LEASE_EXPIRED_MESSAGE,
        retryCount: job.retryCount,
      },
      leaseExpired: true,
      expectedRetryCount: job.retryCount,
      finalize: true,
    });
    return updated !== null;
  }

  private emptyStats(): JobStatistics {
    return { completeDuration: 0, queueWaitDuration: 0, runDuration: 0 };
  }

  stop() {
    logger.info('Stopping job rescuer');
    if (this.rescuerIntervalTimeout) {
      clearInterval(this.rescuerIntervalTimeout);
      this.rescuerIntervalTimeout = null;
    }
  }
}
