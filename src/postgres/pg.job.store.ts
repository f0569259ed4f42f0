import { z } from 'zod';
import { DbDriver } from '../types/db.driver.js';
import { Job } from '../types/job.js';
import {
  CreateJobParams,
  FindReadyParams,
  JobStore,
  TransitionParams,
} from '../types/job.store.js';
import { Nullable } from '../util/util.types.js';
import { NotificationTopic } from '../notifier.js';
import { DbJob } from './db.job.js';
import {
  JOB_FIND_DUE_RETRIES,
  JOB_FIND_EXPIRED_LEASES,
  JOB_FIND_READY,
  JOB_GET_BY_ID,
  JOB_INSERT,
  JOB_TRANSITION,
  JOB_UPDATE_STATUS_MESSAGE,
  PG_NOTIFY,
} from './queries.js';

export interface InsertJobPayload {
  id: string;
  kind: string;
}

const jobIdSchema = z.string().uuid();

// The id column is a uuid; any other string cannot name a job.
const isJobId = (id: string): boolean => jobIdSchema.safeParse(id).success;

const toJson = (value: unknown): Nullable<string> =>
  value === undefined || value === null ? null : JSON.stringify(value);

export class PostgresJobStore implements JobStore {
  constructor(
    private db: DbDriver,
    private insertTopic: string = NotificationTopic.NotificationTopicInsert,
  ) {}

  async create(params: CreateJobParams): Promise<Job> {
    const values = [
      params.kind, //1
      params.subjectId, //2
      params.ownerId, //3
      toJson(params.params), //4
      params.maxRetries, //5
    ];
    const result = await this.db.execute<DbJob>(JOB_INSERT, ...values);
    const job = this.toJob(result.rows[0]);

    const payload: InsertJobPayload = { id: job.id, kind: job.kind };
    await this.db.execute(PG_NOTIFY, this.insertTopic, JSON.stringify(payload));

    return job;
  }

  async transition(params: TransitionParams): Promise<Nullable<Job>> {
    if (!isJobId(params.id)) {
      return null;
    }
    const values = [
      params.id, //1
      params.from, //2
      params.to, //3
      params.statusMessage ?? null, //4
      toJson(params.result), //5
      toJson(params.error), //6
      params.attemptedBy ?? null, //7
      params.leaseDuration ?? 0, //8
      params.retryDelay ?? null, //9
      params.incrementRetryCount ?? false, //10
      params.finalize ?? false, //11
      params.leaseExpired ?? false, //12
      params.retryDue ?? false, //13
      params.expectedRetryCount ?? null, //14
    ];
    const result = await this.db.execute<DbJob>(JOB_TRANSITION, ...values);

    return result.rows.length === 1 ? this.toJob(result.rows[0]) : null;
  }

  async get(id: string): Promise<Nullable<Job>> {
    if (!isJobId(id)) {
      return null;
    }
    const result = await this.db.execute<DbJob>(JOB_GET_BY_ID, id);

    return result.rows.length === 1 ? this.toJob(result.rows[0]) : null;
  }

  async updateStatusMessage(id: string, message: string): Promise<boolean> {
    if (!isJobId(id)) {
      return false;
    }
    const result = await this.db.execute(JOB_UPDATE_STATUS_MESSAGE, id, message);

    return result.rowCount === 1;
  }

  async findReady(params: FindReadyParams): Promise<Job[]> {
    const result = await this.db.execute<DbJob>(
      JOB_FIND_READY,
      params.kinds,
      params.limit,
    );

    return result.rows.map((x) => this.toJob(x));
  }

  async findExpiredLeases(limit: number): Promise<Job[]> {
    const result = await this.db.execute<DbJob>(JOB_FIND_EXPIRED_LEASES, limit);

    return result.rows.map((x) => this.toJob(x));
  }

  async findDueRetries(limit: number): Promise<Job[]> {
    const result = await this.db.execute<DbJob>(JOB_FIND_DUE_RETRIES, limit);

    return result.rows.map((x) => this.toJob(x));
  }

  private toJob(dbJob: DbJob): Job {
    return {
      id: dbJob.id,
      kind: dbJob.kind,
      subjectId: dbJob.subject_id,
      ownerId: dbJob.owner_id,
      params: dbJob.params,
      status: dbJob.status,
      retryCount: dbJob.retry_count,
      maxRetries: dbJob.max_retries,
      statusMessage: dbJob.status_message,
      error: dbJob.error,
      result: dbJob.result,
      attemptErrors: dbJob.attempt_errors,
      attemptedBy: dbJob.attempted_by,
      createdAt: dbJob.created_at,
      updatedAt: dbJob.updated_at,
      startedAt: dbJob.started_at,
      completedAt: dbJob.completed_at,
      leaseExpiresAt: dbJob.lease_expires_at,
      retryAt: dbJob.retry_at,
    };
  }
}
