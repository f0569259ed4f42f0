import { Subscription } from 'rxjs';
import throttle from 'lodash.throttle';
import { DbNotification, Notifier } from './notifier.js';
import { Nullable } from './util/util.types.js';
import { Workers } from './worker.js';
import {
  JobExecutor,
  JobExecutorContext,
  JobExecutorOptions,
} from './job.executor.js';
import { ValidationException } from './exceptions/validation.exception.js';
import { logger } from './logger/logger.settings.js';
import { isJobKind } from './types/job.js';

export interface ProducerOptions {
  workerId: string;
  fetchPollInterval: number;
  fetchCoolDown: number;
  // Candidates read per fetch; only one of them is executed at a time.
  batchSize: number;
  executor: Partial<JobExecutorOptions>;
}

export const DEFAULT_PRODUCER_OPTIONS: ProducerOptions = {
  workerId: 'default',
  fetchPollInterval: 1_000,
  fetchCoolDown: 200,
  batchSize: 10,
  executor: {},
};

/**
 * Worker loop. Executes ready jobs one at a time and moves on to the next
 * job only after the current attempt has been written.
 */
export class Producer {
  private insertJobSubscription: Nullable<Subscription> = null;
  private fetchTimeout: Nullable<NodeJS.Timeout> = null;
  private fetching: Nullable<Promise<void>> = null;
  private stopping = false;
  private throttleFetch;
  private options: ProducerOptions;

  constructor(
    private notifier: Notifier,
    private workers: Workers,
    private context: JobExecutorContext,
    options: Partial<ProducerOptions> = {},
  ) {
    this.options = { ...DEFAULT_PRODUCER_OPTIONS, ...options };

    if (this.options.fetchCoolDown <= 0) {
      throw new ValidationException(
        'Fetch cool down should not be equal or less then 0',
      );
    }

    if (this.options.fetchPollInterval <= 0) {
      throw new ValidationException(
        'Fetch poll interval should not be equal or less then 0',
      );
    }

    if (this.options.batchSize <= 0) {
      throw new ValidationException(
        'Batch size should not be equal or less then 0',
      );
    }

    if (!this.options.workerId) {
      throw new ValidationException('Worker id cannot be empty');
    }

    if (this.workers.getKinds().length === 0) {
      throw new ValidationException('No workers are registered');
    }

    this.throttleFetch = throttle(
      () => this.triggerFetch(),
      this.options.fetchCoolDown,
    );
  }

  get busy(): boolean {
    return this.fetching !== null;
  }

  start() {
    logger.info(`Starting producer ${this.options.workerId}`);
    this.stopping = false;
    if (!this.insertJobSubscription) {
      this.insertJobSubscription = this.notifier.onJobInsert((notification) =>
        this.onJobInsert(notification),
      );
    }
    if (!this.fetchTimeout) {
      this.fetchTimeout = setInterval(
        this.throttleFetch,
        this.options.fetchPollInterval,
      );
    }
    this.throttleFetch();
  }

  onJobInsert(notification: DbNotification): void {
    try {
      const parsed: unknown = JSON.parse(notification.payload);
      if (
        typeof parsed === 'object' &&
        parsed !== null &&
        'kind' in parsed &&
        typeof parsed.kind === 'string' &&
        isJobKind(parsed.kind) &&
        this.workers.getWorker(parsed.kind)
      ) {
        this.throttleFetch();
      }
    } catch (error) {
      logger.warn(`Invalid insert notification: `, error);
    }
  }

  /**
   * Executes ready jobs until none can be claimed.
   */
  async runOnce(): Promise<void> {
    let executed = true;
    while (executed && !this.stopping) {
      executed = await this.executeNext();
    }
  }

  private triggerFetch() {
    if (this.fetching || this.stopping) {
      return;
    }

    this.fetching = this.runOnce()
      .catch((error: unknown) => logger.error('Failed to fetch jobs: ', error))
      .finally(() => {
        this.fetching = null;
      });
  }

  private async executeNext(): Promise<boolean> {
    const candidates = await this.context.store.findReady({
      kinds: this.workers.getKinds(),
      limit: this.options.batchSize,
    });

    for (const job of candidates) {
      const worker = this.workers.getWorker(job.kind);
      if (this.stopping || !worker) {
        continue;
      }

      const executor = new JobExecutor(job, worker, this.context, {
        ...this.options.executor,
        workerId: this.options.workerId,
      });
      await executor.execute();

      if (executor.claimed) {
        return true;
      }
    }

    return false;
  }

  async stop(): Promise<void> {
    logger.info(`Stopping producer ${this.options.workerId}`);
    this.stopping = true;

    if (this.insertJobSubscription) {
      this.insertJobSubscription.unsubscribe();
      this.insertJobSubscription = null;
    }

    if (this.fetchTimeout) {
      clearInterval(this.fetchTimeout);
      this.fetchTimeout = null;
    }

    this.throttleFetch.cancel();

    if (this.fetching) {
      await this.fetching;
    }
  }
}
