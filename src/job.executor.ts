import path from 'node:path';
import { DateTime } from 'luxon';
import { Subject } from 'rxjs';
import {
  FailureKind,
  Job,
  JobError,
  JobResult,
  JobStatistics,
  JobStatus,
} from './types/job.js';
import { JobStore } from './types/job.store.js';
import { ToolInvoker } from './types/tool.js';
import { Event } from './types/event.js';
import { ToolWorker } from './worker.js';
import { createTimeoutPromise, toError } from './util/promise.js';
import { Nullable } from './util/util.types.js';
import { ValidationException } from './exceptions/validation.exception.js';
import { ConfigurationException } from './exceptions/configuration.exception.js';
import { InfrastructureException } from './exceptions/infrastructure.exception.js';
import { TimedoutJobException } from './exceptions/timedout.job.exception.js';
import { JobCompleter } from './job.completer.js';
import { RetryPolicy } from './retry.policy.js';
import { JobStatusReporter } from './status.reporter.js';
import { resetDirectory } from './tools/artifacts.js';
import { logger } from './logger/logger.settings.js';

export interface JobExecutorContext {
  store: JobStore;
  invoker: ToolInvoker;
  completer: JobCompleter;
  retryPolicy: RetryPolicy;
  events?: Subject<Event>;
}

export interface JobExecutorOptions {
  workerId: string;
  // Passed to the invoker, which stops the tool cooperatively.
  softTimeLimit: number;
  // Enforced around the invocation, the attempt fails when it passes.
  hardTimeLimit: number;
  leaseDuration: number;
  workDir: string;
}

export const DEFAULT_JOB_EXECUTOR_OPTIONS: JobExecutorOptions = {
  workerId: 'default',
  softTimeLimit: 25 * 60 * 1_000,
  hardTimeLimit: 30 * 60 * 1_000,
  leaseDuration: 35 * 60 * 1_000,
  workDir: 'work',
};

export type TerminalStatus = Extract<
  JobStatus,
  'completed' | 'completed_with_errors' | 'failed'
>;

export const classifyOutcome = (result: JobResult): TerminalStatus => {
  if (result.artifacts.length === 0) {
    return 'failed';
  }

  return result.errors.length > 0 ? 'completed_with_errors' : 'completed';
};

const STATUS_MESSAGES: Record<TerminalStatus, string> = {
  completed: 'Completed',
  completed_with_errors: 'Completed with errors',
  failed: 'Failed',
};

/**
 * Runs a single attempt of a job: claims it, invokes its tool, and writes the
 * outcome or schedules a retry.
 */
export class JobExecutor {
  private start = DateTime.utc();
  private stats: JobStatistics = {
    completeDuration: 0,
    queueWaitDuration: 0,
    runDuration: 0,
  };
  private options: JobExecutorOptions;
  private wasClaimed = false;

  constructor(
    private job: Job,
    private worker: ToolWorker,
    private context: JobExecutorContext,
    options: Partial<JobExecutorOptions> = {},
  ) {
    this.options = { ...DEFAULT_JOB_EXECUTOR_OPTIONS, ...options };

    if (this.worker.kind !== this.job.kind) {
      throw new ValidationException(
        `Worker for ${this.worker.kind} cannot execute ${this.job.kind} job`,
      );
    }

    if (!this.options.workerId) {
      throw new ValidationException('Worker id cannot be empty');
    }

    if (!this.options.workDir) {
      throw new ValidationException('Work directory cannot be empty');
    }

    if (this.options.softTimeLimit <= 0) {
      throw new ValidationException('Soft time limit is equal or less then 0');
    }

    if (this.options.hardTimeLimit < this.options.softTimeLimit) {
      throw new ValidationException(
        'Hard time limit is less then soft time limit',
      );
    }

    if (this.options.leaseDuration < this.options.hardTimeLimit) {
      throw new ValidationException(
        'Lease duration is less then hard time limit',
      );
    }
  }

  get claimed(): boolean {
    return this.wasClaimed;
  }

  get outputDir(): string {
    return path.join(
      this.options.workDir,
      this.job.ownerId,
      this.job.kind,
      this.job.id,
    );
  }

  /**
   * Resolves to the job as written at the end of the attempt, or to null when
   * the job was claimed elsewhere or its final write did not apply.
   */
  async execute(): Promise<Nullable<Job>> {
    this.start = DateTime.utc();
    this.stats.queueWaitDuration = this.start
      .diff(DateTime.fromJSDate(this.job.updatedAt, { zone: 'UTC' }))
      .as('milliseconds');

    const claimed = await this.context.store.transition({
      id: this.job.id,
      from: ['queued'],
      to: 'processing',
      statusMessage: 'Processing',
      attemptedBy: this.options.workerId,
      leaseDuration: this.options.leaseDuration,
    });

    if (!claimed) {
      logger.debug(`Job ${this.job.id} is already handled, skipping`);
      return null;
    }
    this.job = claimed;
    this.wasClaimed = true;
    logger.info(
      `Executing job ${this.job.id} (${this.job.kind}), retry ${this.job.retryCount}`,
    );

    try {
      return await this.run();
    } catch (error) {
      logger.warn(`Job ${this.job.id} attempt failed: `, error);
      try {
        return await this.reportError(toError(error));
      } catch (reportError) {
        logger.error(
          `Failed to record failure of job ${this.job.id}: `,
          reportError,
        );
        return null;
      }
    }
  }

  private async run(): Promise<Nullable<Job>> {
    const prepared = this.worker.prepare(this.job);
    const outputDir = this.outputDir;
    await resetDirectory(outputDir);

    const reporter = new JobStatusReporter(
      this.job,
      this.context.store,
      this.context.events,
    );
    const { promise } = createTimeoutPromise(
      (signal) =>
        this.context.invoker.invoke({
          ...prepared,
          outputDir,
          timeout: this.options.softTimeLimit,
          signal,
          reporter,
        }),
      this.options.hardTimeLimit,
    );
    const invocation = await promise;

    this.stats.runDuration = DateTime.utc()
      .diff(this.start)
      .as('milliseconds');

    if (invocation.timedOut) {
      return this.retryOrFail('timeout', invocation.message);
    }

    const result = this.worker.interpret(this.job, invocation);
    return this.finish(result);
  }

  private async finish(result: JobResult): Promise<Nullable<Job>> {
    let status = classifyOutcome(result);

    if (status === 'failed') {
      return this.fail(
        'tool',
        result.errors.length > 0
          ? result.errors.join('; ')
          : 'Tool produced no output',
      );
    }

    if (this.worker.materialize) {
      if (!(await this.holdsClaim())) {
        logger.warn(
          `Job ${this.job.id} was reclaimed during the attempt, dropping its result`,
        );
        return null;
      }
      try {
        await this.worker.materialize(this.job, result);
      } catch (error) {
        logger.warn(`Failed to materialize job ${this.job.id}: `, error);
        result = {
          ...result,
          errors: [
            ...result.errors,
            `Failed to create derived records: ${toError(error).message}`,
          ],
        };
        status = 'completed_with_errors';
      }
    }

    return this.context.completer.complete(this.stats, {
      id: this.job.id,
      from: ['processing'],
      expectedRetryCount: this.job.retryCount,
      to: status,
      statusMessage: STATUS_MESSAGES[status],
      result,
      finalize: true,
    });
  }

  private async holdsClaim(): Promise<boolean> {
    const current = await this.context.store.get(this.job.id);
    return (
      current !== null &&
      current.status === 'processing' &&
      current.retryCount === this.job.retryCount
    );
  }

  private reportError(error: Error): Promise<Nullable<Job>> {
    if (error instanceof ConfigurationException) {
      return this.fail('configuration', error.message);
    }

    if (error instanceof TimedoutJobException) {
      return this.retryOrFail('timeout', error.message);
    }

    if (error instanceof InfrastructureException) {
      return this.retryOrFail('infrastructure', error.message);
    }

    return this.retryOrFail('internal', error.message);
  }

  private retryOrFail(
    kind: FailureKind,
    message: string,
  ): Promise<Nullable<Job>> {
    const decision = this.context.retryPolicy(this.job);
    if (!decision.retry) {
      return this.fail(kind, message);
    }

    logger.info(
      `Job ${this.job.id} will be retried in ${decision.delay}ms (${kind})`,
    );
    return this.context.completer.complete(this.stats, {
      id: this.job.id,
      from: ['processing'],
      expectedRetryCount: this.job.retryCount,
      to: 'failed',
      statusMessage: `Retry ${decision.nextRetryCount} of ${this.job.maxRetries} scheduled`,
      error: this.createError(kind, message),
      retryDelay: decision.delay,
    });
  }

  private fail(kind: FailureKind, message: string): Promise<Nullable<Job>> {
    logger.info(`Job ${this.job.id} failed (${kind}): ${message}`);
    return this.context.completer.complete(this.stats, {
      id: this.job.id,
      from: ['processing'],
      expectedRetryCount: this.job.retryCount,
      to: 'failed',
      statusMessage: STATUS_MESSAGES.failed,
      error: this.createError(kind, message),
      finalize: true,
    });
  }

  private createError(kind: FailureKind, message: string): JobError {
    return { kind, message, retryCount: this.job.retryCount };
  }
}
