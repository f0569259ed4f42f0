/* eslint-disable max-len */
const JOB_COLUMNS = `id, kind, subject_id, owner_id, params, status, retry_count, max_retries, status_message, error, result, attempt_errors, attempted_by, created_at, updated_at, started_at, completed_at, lease_expires_at, retry_at`;

export const JOB_INSERT = `
INSERT INTO forensics_job(
    kind,
    subject_id,
    owner_id,
    params,
    max_retries,
    status,
    status_message
) VALUES (
    $1::text,
    $2::text,
    $3::text,
    coalesce($4::jsonb, '{}'),
    $5::smallint,
    'queued'::forensics_job_status,
    'Queued'
) RETURNING ${JOB_COLUMNS}
`;

export const JOB_GET_BY_ID = `
SELECT ${JOB_COLUMNS}
FROM forensics_job
WHERE id = $1::uuid
LIMIT 1
`;

// All preconditions are part of the WHERE clause: of concurrent callers
// racing on one job, at most one gets a row back.
export const JOB_TRANSITION = `
UPDATE forensics_job
SET
    status           = $3::forensics_job_status,
    status_message   = coalesce($4::text, status_message),
    result           = CASE WHEN $3::forensics_job_status IN ('completed', 'completed_with_errors') THEN $5::jsonb ELSE NULL END,
    error            = CASE WHEN $3::forensics_job_status = 'failed' THEN $6::jsonb ELSE NULL END,
    attempt_errors   = CASE WHEN $6::jsonb IS NOT NULL THEN attempt_errors || jsonb_build_array($6::jsonb) ELSE attempt_errors END,
    attempted_by     = CASE WHEN $7::text IS NOT NULL THEN array_append(attempted_by, $7::text) ELSE attempted_by END,
    started_at       = CASE WHEN $3::forensics_job_status = 'processing' THEN coalesce(started_at, now()) ELSE started_at END,
    lease_expires_at = CASE WHEN $3::forensics_job_status = 'processing' THEN now() + $8::double precision * interval '1 millisecond' ELSE NULL END,
    retry_at         = CASE WHEN $9::double precision IS NOT NULL THEN now() + $9::double precision * interval '1 millisecond' ELSE NULL END,
    retry_count      = CASE WHEN $10::boolean THEN retry_count + 1 ELSE retry_count END,
    completed_at     = CASE WHEN $11::boolean THEN coalesce(completed_at, now()) ELSE completed_at END,
    updated_at       = now()
WHERE id = $1::uuid
    AND status = any($2::forensics_job_status[])
    AND (NOT $10::boolean OR retry_count < max_retries)
    AND (NOT $12::boolean OR lease_expires_at < now())
    AND (NOT $13::boolean OR retry_at <= now())
    AND ($14::smallint IS NULL OR retry_count = $14::smallint)
RETURNING ${JOB_COLUMNS}
`;

export const JOB_UPDATE_STATUS_MESSAGE = `
UPDATE forensics_job
SET status_message = $2::text, updated_at = now()
WHERE id = $1::uuid
    AND status = 'processing'::forensics_job_status
`;

export const JOB_FIND_READY = `
SELECT ${JOB_COLUMNS}
FROM forensics_job
WHERE status = 'queued'::forensics_job_status
    AND kind = any($1::text[])
ORDER BY created_at ASC, id ASC
LIMIT $2::integer
`;

export const JOB_FIND_EXPIRED_LEASES = `
SELECT ${JOB_COLUMNS}
FROM forensics_job
WHERE status = 'processing'::forensics_job_status
    AND lease_expires_at < now()
ORDER BY lease_expires_at ASC
LIMIT $1::integer
`;

export const JOB_FIND_DUE_RETRIES = `
SELECT ${JOB_COLUMNS}
FROM forensics_job
WHERE status = 'failed'::forensics_job_status
    AND retry_at IS NOT NULL
    AND retry_at <= now()
ORDER BY retry_at ASC
LIMIT $1::integer
`;

export const PG_NOTIFY = `SELECT pg_notify($1, $2)`;

export const IMAGE_INSERT_MANY = `
INSERT INTO forensics_image(
    owner_id,
    document_id,
    job_id,
    filename,
    file_path,
    file_size,
    source_type
)
SELECT owner_id, document_id, job_id, filename, file_path, file_size, 'extracted'
FROM unnest(
    $1::text[],
    $2::text[],
    $3::uuid[],
    $4::text[],
    $5::text[],
    $6::bigint[]
) AS t(owner_id, document_id, job_id, filename, file_path, file_size)
RETURNING id, owner_id, document_id, job_id, filename, file_path, file_size, source_type, created_at
`;
