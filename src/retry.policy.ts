import { Job, RetryDecision } from './types/job.js';

const DEFAULT_DELAY = 60_000; // 60s

export type RetryPolicy = (job: Job) => RetryDecision;

export interface BuiltInPolicies {
  [index: string]: (delay: number) => RetryPolicy;
}

const decide = (job: Job, delay: number): RetryDecision => ({
  retry: job.retryCount < job.maxRetries,
  delay,
  nextRetryCount: job.retryCount + 1,
});

export class RetryPolicies {
  static builtinPolicies: BuiltInPolicies = {
    fixed: (delay: number) => (job: Job) =>
      decide(job, delay > 0 ? delay : DEFAULT_DELAY),
    exponential: (delay: number) => {
      const base = delay > 0 ? delay : DEFAULT_DELAY;
      return function (job: Job): RetryDecision {
        return decide(job, Math.round(Math.pow(2, job.retryCount) * base));
      };
    },
  };
}
