export const JOB_KINDS = [
  'extract_images',
  'detect_tamper',
  'remove_watermark',
] as const;

export type JobKind = (typeof JOB_KINDS)[number];

export type JobStatus =
  | 'queued'
  | 'processing'
  | 'completed'
  | 'completed_with_errors'
  | 'failed';

export const SUCCESS_STATUSES: readonly JobStatus[] = [
  'completed',
  'completed_with_errors',
];

export type FailureKind =
  | 'configuration'
  | 'infrastructure'
  | 'timeout'
  | 'tool'
  | 'lease_expired'
  | 'internal';

export type JobParams = Record<string, unknown>;

export interface JobError {
  kind: FailureKind;
  message: string;
  retryCount: number;
}

export interface ArtifactInfo {
  name: string;
  path: string;
  size: number;
}

export interface JobResult {
  artifacts: ArtifactInfo[];
  errors: string[];
  summary: Record<string, unknown>;
}

// Job contains the properties of a job that are persisted to the database.
export interface Job {
  id: string;
  kind: JobKind;
  subjectId: string;
  ownerId: string;
  params: JobParams;
  status: JobStatus;
  retryCount: number;
  maxRetries: number;
  statusMessage: string;
  error: JobError | null;
  result: JobResult | null;
  attemptErrors: JobError[];
  attemptedBy: string[];
  createdAt: Date;
  updatedAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  leaseExpiresAt: Date | null;
  // Set while a failed attempt waits for its next retry.
  retryAt: Date | null;
}

export interface RetryDecision {
  retry: boolean;
  delay: number;
  nextRetryCount: number;
}

export interface JobStatistics {
  completeDuration: number;
  queueWaitDuration: number;
  runDuration: number;
}

export const isJobKind = (value: string): value is JobKind =>
  JOB_KINDS.some((kind) => kind === value);
