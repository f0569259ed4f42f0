import { randomUUID } from 'node:crypto';
import { Job } from '../types/job.js';
import {
  CreateJobParams,
  FindReadyParams,
  JobStore,
  TransitionParams,
} from '../types/job.store.js';
import { Nullable } from './util.types.js';

/**
 * In-process JobStore with the same conditional-update rules as the
 * PostgreSQL store. Its clock can be moved forward with `advance`.
 */
export class MemoryJobStore implements JobStore {
  private jobs = new Map<string, Job>();
  private offset = 0;

  constructor(private clock: () => number = () => Date.now()) {}

  now(): Date {
    return new Date(this.clock() + this.offset);
  }

  advance(ms: number) {
    this.offset += ms;
  }

  async create(params: CreateJobParams): Promise<Job> {
    const now = this.now();
    const job: Job = {
      id: randomUUID(),
      kind: params.kind,
      subjectId: params.subjectId,
      ownerId: params.ownerId,
      params: structuredClone(params.params),
      status: 'queued',
      retryCount: 0,
      maxRetries: params.maxRetries,
      statusMessage: 'Queued',
      error: null,
      result: null,
      attemptErrors: [],
      attemptedBy: [],
      createdAt: now,
      updatedAt: now,
      startedAt: null,
      completedAt: null,
      leaseExpiresAt: null,
      retryAt: null,
    };
    this.jobs.set(job.id, job);

    return structuredClone(job);
  }

  async transition(params: TransitionParams): Promise<Nullable<Job>> {
    const job = this.jobs.get(params.id);
    const now = this.now();

    if (!job || !params.from.includes(job.status)) {
      return null;
    }
    if (params.incrementRetryCount && job.retryCount >= job.maxRetries) {
      return null;
    }
    if (
      params.leaseExpired &&
      !(job.leaseExpiresAt && job.leaseExpiresAt < now)
    ) {
      return null;
    }
    if (
      params.expectedRetryCount !== undefined &&
      job.retryCount !== params.expectedRetryCount
    ) {
      return null;
    }
    if (params.retryDue && !(job.retryAt && job.retryAt <= now)) {
      return null;
    }

    const to = params.to;
    job.status = to;
    job.statusMessage = params.statusMessage ?? job.statusMessage;
    job.result =
      to === 'completed' || to === 'completed_with_errors'
        ? structuredClone(params.result ?? null)
        : null;
    job.error = to === 'failed' ? structuredClone(params.error ?? null) : null;
    if (params.error) {
      job.attemptErrors.push(structuredClone(params.error));
    }
    if (params.attemptedBy) {
      job.attemptedBy.push(params.attemptedBy);
    }
    if (to === 'processing') {
      job.startedAt = job.startedAt ?? now;
      job.leaseExpiresAt = new Date(
        now.getTime() + (params.leaseDuration ?? 0),
      );
    } else {
      job.leaseExpiresAt = null;
    }
    job.retryAt =
      params.retryDelay !== undefined
        ? new Date(now.getTime() + params.retryDelay)
        : null;
    if (params.incrementRetryCount) {
      job.retryCount += 1;
    }
    if (params.finalize) {
      job.completedAt = job.completedAt ?? now;
    }
    job.updatedAt = now;

    return structuredClone(job);
  }

  async get(id: string): Promise<Nullable<Job>> {
    const job = this.jobs.get(id);

    return job ? structuredClone(job) : null;
  }

  async updateStatusMessage(id: string, message: string): Promise<boolean> {
    const job = this.jobs.get(id);
    if (!job || job.status !== 'processing') {
      return false;
    }

    job.statusMessage = message;
    job.updatedAt = this.now();
    return true;
  }

  async findReady(params: FindReadyParams): Promise<Job[]> {
    return this.select(
      (job) => job.status === 'queued' && params.kinds.includes(job.kind),
      (job) => job.createdAt,
      params.limit,
    );
  }

  async findExpiredLeases(limit: number): Promise<Job[]> {
    const now = this.now();
    return this.select(
      (job) =>
        job.status === 'processing' &&
        job.leaseExpiresAt !== null &&
        job.leaseExpiresAt < now,
      (job) => job.leaseExpiresAt ?? job.createdAt,
      limit,
    );
  }

  async findDueRetries(limit: number): Promise<Job[]> {
    const now = this.now();
    return this.select(
      (job) =>
        job.status === 'failed' && job.retryAt !== null && job.retryAt <= now,
      (job) => job.retryAt ?? job.createdAt,
      limit,
    );
  }

  private select(
    predicate: (job: Job) => boolean,
    orderBy: (job: Job) => Date,
    limit: number,
  ): Job[] {
    return [...this.jobs.values()]
      .filter(predicate)
      .sort((a, b) => orderBy(a).getTime() - orderBy(b).getTime())
      .slice(0, limit)
      .map((job) => structuredClone(job));
  }
}
