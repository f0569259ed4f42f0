import {
  JobError,
  JobKind,
  JobParams,
  JobResult,
  JobStatus,
} from '../types/job.js';

export interface DbJob {
  id: string;
  kind: JobKind;
  subject_id: string;
  owner_id: string;
  params: JobParams;
  status: JobStatus;
  retry_count: number;
  max_retries: number;
  status_message: string;
  error: JobError | null;
  result: JobResult | null;
  attempt_errors: JobError[];
  attempted_by: string[];
  created_at: Date;
  updated_at: Date;
  started_at: Date | null;
  completed_at: Date | null;
  lease_expires_at: Date | null;
  retry_at: Date | null;
}

export interface DbImage {
  id: string;
  owner_id: string;
  document_id: string;
  job_id: string;
  filename: string;
  file_path: string;
  file_size: string;
  source_type: string;
  created_at: Date;
}
