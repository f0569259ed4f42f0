import { Subject } from 'rxjs';
import { logger } from './logger/logger.settings.js';
import { Event, EventKind } from './types/event.js';
import { Job } from './types/job.js';
import { JobStore } from './types/job.store.js';
import { StatusReporter } from './types/tool.js';

/**
 * Writes progress messages to the job's `statusMessage` and publishes them as
 * progress events. Never rejects: progress is best-effort.
 */
export class JobStatusReporter implements StatusReporter {
  constructor(
    private job: Job,
    private store: JobStore,
    private events?: Subject<Event>,
  ) {}

  async report(message: string): Promise<void> {
    try {
      const updated = await this.store.updateStatusMessage(
        this.job.id,
        message,
      );
      if (updated) {
        this.events?.next({
          kind: EventKind.JobProgress,
          job: { ...this.job, statusMessage: message },
          message,
        });
      }
    } catch (error) {
      logger.warn(`Failed to update status of job ${this.job.id}: `, error);
    }
  }
}
