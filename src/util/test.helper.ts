import { Job } from '../types/job.js';

export const createFakeJob = (overrides: Partial<Job> = {}): Job => ({
  id: '00000000-0000-4000-8000-000000000001',
  kind: 'remove_watermark',
  subjectId: 'document-1',
  ownerId: 'user-1',
  params: { pdfPath: '/tmp/input.pdf', aggressiveness: 2 },
  status: 'queued',
  retryCount: 0,
  maxRetries: 3,
  statusMessage: 'Queued',
  error: null,
  result: null,
  attemptErrors: [],
  attemptedBy: [],
  createdAt: new Date(),
  updatedAt: new Date(),
  startedAt: null,
  completedAt: null,
  leaseExpiresAt: null,
  retryAt: null,
  ...overrides,
});
