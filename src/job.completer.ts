import { Subject, Subscription } from 'rxjs';
import { Job, JobStatistics } from './types/job.js';
import { JobStore, TransitionParams } from './types/job.store.js';
import { DateTime } from 'luxon';
import { retry } from './util/promise.js';
import { Nullable } from './util/util.types.js';

export interface CompletedJobEvent {
  job: Job;
  jobStatistics: JobStatistics;
}

export type CompletedJobEventHandler = (event: CompletedJobEvent) => void;

/**
 * Writes the outcome of an attempt. Store errors are retried; a transition
 * whose precondition no longer holds resolves to null without an event.
 */
export class JobCompleter {
  private completedSubject = new Subject<CompletedJobEvent>();

  constructor(private store: JobStore) {}

  async complete(
    jobStatistics: JobStatistics,
    params: TransitionParams,
  ): Promise<Nullable<Job>> {
    const start = DateTime.utc();
    const job = await retry(async () => await this.store.transition(params), {
      retries: 3,
      retryIntervalMs: 500,
    });

    jobStatistics.completeDuration = DateTime.utc()
      .diff(start, 'milliseconds')
      .as('milliseconds');

    if (job) {
      this.completedSubject.next({ job, jobStatistics });
    }

    return job;
  }

  subscribe(handler: CompletedJobEventHandler): Subscription {
    return this.completedSubject.subscribe(handler);
  }
}
