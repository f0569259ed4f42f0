import { Job, JobStatistics } from './job.js';

export enum EventKind {
  JobCompleted = 'job_completed',
  JobCompletedWithErrors = 'job_completed_with_errors',
  JobFailed = 'job_failed',
  JobRetryScheduled = 'job_retry_scheduled',
  JobRequeued = 'job_requeued',
  JobProgress = 'job_progress',
}

export interface Event {
  kind: EventKind;
  job: Job;
  stats?: JobStatistics;
  message?: string;
}
