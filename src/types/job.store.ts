import { Nullable } from '../util/util.types.js';
import {
  Job,
  JobError,
  JobKind,
  JobParams,
  JobResult,
  JobStatus,
} from './job.js';

export interface CreateJobParams {
  kind: JobKind;
  subjectId: string;
  ownerId: string;
  params: JobParams;
  maxRetries: number;
}

/**
 * Conditional status update. The update applies only when the job's current
 * status is one of `from` and every enabled precondition holds.
 *
 * Timestamps are never supplied by callers: the store derives them from its
 * own clock, callers pass durations in milliseconds instead.
 */
export interface TransitionParams {
  id: string;
  from: JobStatus[];
  to: JobStatus;
  statusMessage?: string;
  /**
   * Stored only when `to` is `completed` or `completed_with_errors`.
   */
  result?: JobResult;
  /**
   * Stored only when `to` is `failed`. Always appended to the attempt history.
   */
  error?: JobError;
  /**
   * Worker id appended to `attemptedBy`.
   */
  attemptedBy?: string;
  /**
   * Lease length for a `processing` transition.
   */
  leaseDuration?: number;
  /**
   * Marks a failed attempt as waiting for a retry after the given delay.
   */
  retryDelay?: number;
  /**
   * Increments `retryCount`. Precondition: `retryCount < maxRetries`.
   */
  incrementRetryCount?: boolean;
  /**
   * Precondition: the processing lease has already expired.
   */
  leaseExpired?: boolean;
  /**
   * Precondition: the pending retry time has been reached.
   */
  retryDue?: boolean;
  /**
   * Precondition: `retryCount` still equals the attempt the caller claimed.
   */
  expectedRetryCount?: number;
  /**
   * Sets `completedAt` unless it is already set.
   */
  finalize?: boolean;
}

export interface FindReadyParams {
  kinds: JobKind[];
  limit: number;
}

export interface JobStore {
  create(params: CreateJobParams): Promise<Job>;
  transition(params: TransitionParams): Promise<Nullable<Job>>;
  get(id: string): Promise<Nullable<Job>>;
  updateStatusMessage(id: string, message: string): Promise<boolean>;
  findReady(params: FindReadyParams): Promise<Job[]>;
  findExpiredLeases(limit: number): Promise<Job[]>;
  findDueRetries(limit: number): Promise<Job[]>;
}
