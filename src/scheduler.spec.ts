import { DEFAULT_SCHEDULER_OPTIONS, Scheduler } from './scheduler.js';
import { JobCompleter } from './job.completer.js';
import { MemoryJobStore } from './util/memory.job.store.js';
import { ValidationException } from './exceptions/validation.exception.js';
import { Job } from './types/job.js';

describe('scheduler', () => {
  let store: MemoryJobStore;
  let completer: JobCompleter;

  const createRetryPendingJob = async (retryDelay: number): Promise<Job> => {
    const job = await store.create({
      kind: 'detect_tamper',
      subjectId: 'image-1',
      ownerId: 'user-1',
      params: { imagePath: '/tmp/image.png', saveNoiseprint: false },
      maxRetries: 3,
    });
    await store.transition({
      id: job.id,
      from: ['queued'],
      to: 'processing',
      attemptedBy: 'worker-1',
      leaseDuration: 10_000,
    });
    const failed = await store.transition({
      id: job.id,
      from: ['processing'],
      to: 'failed',
      error: { kind: 'infrastructure', message: 'docker down', retryCount: 0 },
      retryDelay,
    });
    if (!failed) {
      throw new Error('job was not failed');
    }
    return failed;
  };

  beforeEach(() => {
    store = new MemoryJobStore(() => 0);
    completer = new JobCompleter(store);
  });

  describe('constructor', () => {
    it('should throw exception if interval is 0', () => {
      const options = { ...DEFAULT_SCHEDULER_OPTIONS, interval: 0 };
      expect(() => new Scheduler(store, completer, options)).toThrow(
        ValidationException,
      );
    });

    it('should throw exception if limit is less then 0', () => {
      const options = { ...DEFAULT_SCHEDULER_OPTIONS, limit: -1 };
      expect(() => new Scheduler(store, completer, options)).toThrow(
        ValidationException,
      );
    });
  });

  describe('runOnce', () => {
    it('should not requeue job before its retry time', async () => {
      const job = await createRetryPendingJob(60_000);
      store.advance(59_999);

      expect(await new Scheduler(store, completer).runOnce()).toBe(0);
      expect((await store.get(job.id))?.status).toBe('failed');
    });

    it('should requeue job once its retry time is reached', async () => {
      const job = await createRetryPendingJob(60_000);
      store.advance(60_000);

      expect(await new Scheduler(store, completer).runOnce()).toBe(1);

      const requeued = await store.get(job.id);
      expect(requeued?.status).toBe('queued');
      expect(requeued?.retryCount).toBe(1);
      expect(requeued?.retryAt).toBeNull();
      expect(requeued?.error).toBeNull();
      expect(requeued?.statusMessage).toBe('Queued for retry 1 of 3');
    });

    it('should ignore terminally failed jobs', async () => {
      const job = await store.create({
        kind: 'extract_images',
        subjectId: 'document-1',
        ownerId: 'user-1',
        params: { pdfPath: '/tmp/input.pdf' },
        maxRetries: 3,
      });
      await store.transition({
        id: job.id,
        from: ['queued'],
        to: 'failed',
        error: { kind: 'configuration', message: 'bad', retryCount: 0 },
        finalize: true,
      });
      store.advance(3_600_000);

      expect(await new Scheduler(store, completer).runOnce()).toBe(0);
    });

    it('should emit completion events for requeued jobs', async () => {
      await createRetryPendingJob(1_000);
      store.advance(1_000);
      const statuses: string[] = [];
      completer.subscribe((event) => statuses.push(event.job.status));

      await new Scheduler(store, completer).runOnce();

      expect(statuses).toEqual(['queued']);
    });
  });
});
