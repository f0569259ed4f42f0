import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.raw(`
CREATE TYPE forensics_job_status AS ENUM (
    'queued',
    'processing',
    'completed',
    'completed_with_errors',
    'failed'
);

CREATE TABLE forensics_job (
    id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
    kind text NOT NULL,
    subject_id text NOT NULL,
    owner_id text NOT NULL,
    params jsonb NOT NULL DEFAULT '{}',
    status forensics_job_status NOT NULL DEFAULT 'queued',
    retry_count smallint NOT NULL DEFAULT 0,
    max_retries smallint NOT NULL,
    status_message text NOT NULL DEFAULT '',
    error jsonb,
    result jsonb,
    attempt_errors jsonb NOT NULL DEFAULT '[]',
    attempted_by text[] NOT NULL DEFAULT '{}',
    created_at timestamptz NOT NULL DEFAULT now(),
    updated_at timestamptz NOT NULL DEFAULT now(),
    started_at timestamptz,
    completed_at timestamptz,
    lease_expires_at timestamptz,
    retry_at timestamptz,
    CONSTRAINT kind_check CHECK (kind IN ('extract_images', 'detect_tamper', 'remove_watermark')),
    CONSTRAINT retry_count_check CHECK (retry_count >= 0 AND retry_count <= max_retries),
    CONSTRAINT result_error_check CHECK (result IS NULL OR error IS NULL)
);

CREATE INDEX forensics_job_status_kind_created_at_index ON forensics_job (status, kind, created_at);
CREATE INDEX forensics_job_lease_expires_at_index ON forensics_job (lease_expires_at) WHERE status = 'processing';
CREATE INDEX forensics_job_retry_at_index ON forensics_job (retry_at) WHERE status = 'failed';
CREATE INDEX forensics_job_subject_id_index ON forensics_job (subject_id);

CREATE TABLE forensics_image (
    id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
    owner_id text NOT NULL,
    document_id text NOT NULL,
    job_id uuid NOT NULL REFERENCES forensics_job (id),
    filename text NOT NULL,
    file_path text NOT NULL,
    file_size bigint NOT NULL,
    source_type text NOT NULL,
    created_at timestamptz NOT NULL DEFAULT now()
);

CREATE INDEX forensics_image_document_id_index ON forensics_image (document_id);
`);
}

export async function down(knex: Knex): Promise<void> {
  await knex.raw(`
DROP TABLE forensics_image;
DROP TABLE forensics_job;
DROP TYPE forensics_job_status;
`);
}
