import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Subscription } from 'rxjs';
import { mock, MockProxy } from 'jest-mock-extended';
import { Client, ClientOptions } from './client.js';
import { ValidationException } from './exceptions/validation.exception.js';
import { ConfigurationException } from './exceptions/configuration.exception.js';
import { LogLevels } from './logger/logger.settings.js';
import { MemoryJobStore } from './util/memory.job.store.js';
import { DbDriver } from './types/db.driver.js';
import { ImageRepository } from './types/image.repository.js';
import { InvocationResult, ToolInvoker } from './types/tool.js';
import { Event, EventKind } from './types/event.js';
import { Workers } from './worker.js';
import { RemoveWatermarkWorker } from './workers/remove.watermark.worker.js';
import { watermarkRemovalTool } from './tools/builtin.tools.js';
import { sleep } from './util/promise.js';

const completedInvocation: InvocationResult = {
  success: true,
  message: 'Completed with 1 output file(s)',
  exitCode: 0,
  timedOut: false,
  artifacts: [
    {
      name: 'input_watermark_removed_m2.pdf',
      path: '/work/input_watermark_removed_m2.pdf',
      size: 12345,
    },
  ],
  stdout: '',
  stderr: '',
};

describe('client', () => {
  let driver: MockProxy<DbDriver>;
  let store: MemoryJobStore;
  let invoker: MockProxy<ToolInvoker>;
  let options: ClientOptions;

  beforeEach(() => {
    driver = mock<DbDriver>();
    driver.onNotification.mockReturnValue(new Subscription());
    store = new MemoryJobStore();
    invoker = mock<ToolInvoker>();
    options = {
      driver,
      store,
      invoker,
      imageRepository: mock<ImageRepository>(),
      id: 'worker-1',
      logLevel: LogLevels.SILENT,
    };
  });

  describe('constructor', () => {
    it('should throw exception if neither database uri nor driver is supplied', () => {
      expect(() => new Client({ store })).toThrow(ValidationException);
    });

    it('should throw exception if id is empty string', () => {
      expect(() => new Client({ ...options, id: '' })).toThrow(
        ValidationException,
      );
    });

    it('should throw exception if soft time limit is 0', () => {
      expect(() => new Client({ ...options, softTimeLimit: 0 })).toThrow(
        ValidationException,
      );
    });

    it('should throw exception if hard time limit is less then soft time limit', () => {
      expect(
        () =>
          new Client({ ...options, softTimeLimit: 2_000, hardTimeLimit: 1_000 }),
      ).toThrow(ValidationException);
    });

    it('should throw exception if lease duration is less then hard time limit', () => {
      expect(
        () =>
          new Client({
            ...options,
            hardTimeLimit: 60_000,
            leaseDuration: 59_999,
          }),
      ).toThrow(ValidationException);
    });

    it('should derive lease duration from hard time limit', () => {
      expect(
        () =>
          new Client({
            ...options,
            softTimeLimit: 1_000,
            hardTimeLimit: 60 * 60 * 1_000,
          }),
      ).not.toThrow();
    });

    it('should throw exception if max retries is negative', () => {
      expect(() => new Client({ ...options, maxRetries: -1 })).toThrow(
        ValidationException,
      );
    });

    it('should throw exception if max retries is not an integer', () => {
      expect(() => new Client({ ...options, maxRetries: 1.5 })).toThrow(
        ValidationException,
      );
    });

    it('should throw exception if retry base delay is 0', () => {
      expect(() => new Client({ ...options, retryBaseDelay: 0 })).toThrow(
        ValidationException,
      );
    });

    it('should throw exception if rescue interval is less then 0', () => {
      expect(() => new Client({ ...options, rescueInterval: -1 })).toThrow(
        ValidationException,
      );
    });

    it('should throw exception if scheduler interval is 0', () => {
      expect(() => new Client({ ...options, schedulerInterval: 0 })).toThrow(
        ValidationException,
      );
    });

    it('should throw exception if fetch cool down is 0', () => {
      expect(() => new Client({ ...options, fetchCoolDown: 0 })).toThrow(
        ValidationException,
      );
    });
  });

  describe('submitJob', () => {
    it('should store a queued job with validated params', async () => {
      const client = new Client(options);

      const id = await client.submitJob('remove_watermark', 'document-1', 'user-1', {
        pdfPath: '/tmp/input.pdf',
      });

      const job = await client.getJobStatus(id);
      expect(job?.kind).toBe('remove_watermark');
      expect(job?.status).toBe('queued');
      expect(job?.statusMessage).toBe('Queued');
      expect(job?.params).toEqual({
        pdfPath: '/tmp/input.pdf',
        aggressiveness: 2,
      });
      expect(job?.maxRetries).toBe(3);
      expect(job?.retryCount).toBe(0);
    });

    it('should use configured max retries', async () => {
      const client = new Client({ ...options, maxRetries: 0 });

      const id = await client.submitJob('extract_images', 'document-1', 'user-1', {
        pdfPath: '/tmp/input.pdf',
      });

      expect((await client.getJobStatus(id))?.maxRetries).toBe(0);
    });

    it('should reject unknown job kind', async () => {
      const client = new Client(options);

      await expect(
        client.submitJob('ocr', 'document-1', 'user-1', {}),
      ).rejects.toThrow(new ConfigurationException('Unknown job kind: ocr', 'kind'));
    });

    it('should reject job kind without worker', async () => {
      const workers = new Workers();
      workers.addWorker(new RemoveWatermarkWorker(watermarkRemovalTool()));
      const client = new Client({ ...options, workers });

      await expect(
        client.submitJob('extract_images', 'document-1', 'user-1', {
          pdfPath: '/tmp/input.pdf',
        }),
      ).rejects.toThrow('kind: No worker for job kind: extract_images');
    });

    it.each(['', '..', '../etc', 'a/b', 'x'.repeat(129)])(
      'should reject subject id %p',
      async (subjectId) => {
        const client = new Client(options);

        await expect(
          client.submitJob('extract_images', subjectId, 'user-1', {
            pdfPath: '/tmp/input.pdf',
          }),
        ).rejects.toThrow('subjectId: Invalid identifier');
      },
    );

    it('should reject invalid owner id', async () => {
      const client = new Client(options);

      await expect(
        client.submitJob('extract_images', 'document-1', 'user 1', {
          pdfPath: '/tmp/input.pdf',
        }),
      ).rejects.toThrow('ownerId: Invalid identifier');
    });

    it('should reject invalid params without creating a job', async () => {
      const client = new Client(options);

      await expect(
        client.submitJob('remove_watermark', 'document-1', 'user-1', {
          pdfPath: '/tmp/input.pdf',
          aggressiveness: 0,
        }),
      ).rejects.toThrow(ConfigurationException);
      expect(
        await store.findReady({ kinds: ['remove_watermark'], limit: 10 }),
      ).toEqual([]);
      expect(invoker.invoke).not.toHaveBeenCalled();
    });

    it('should reject missing params', async () => {
      const client = new Client(options);

      await expect(
        client.submitJob('detect_tamper', 'image-1', 'user-1'),
      ).rejects.toThrow(ConfigurationException);
    });
  });

  describe('getJobStatus', () => {
    it('should return null for unknown job', async () => {
      const client = new Client(options);

      expect(
        await client.getJobStatus('00000000-0000-4000-8000-000000000099'),
      ).toBeNull();
    });
  });

  describe('start', () => {
    let workDir: string;

    beforeEach(async () => {
      workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'client-'));
    });

    afterEach(async () => {
      await fs.rm(workDir, { recursive: true, force: true });
    });

    const runUntil = async (
      client: Client,
      events: Event[],
      kind: EventKind,
    ) => {
      await client.start();
      while (!events.some((x) => x.kind === kind)) {
        await sleep(5);
      }
      await client.stop();
    };

    it('should execute submitted job and publish completion', async () => {
      invoker.invoke.mockResolvedValue(completedInvocation);
      const client = new Client({ ...options, workDir });
      const events: Event[] = [];
      let completed = false;
      client.subscribe({
        onNext: (event) => events.push(event),
        onCompleted: () => {
          completed = true;
        },
      });

      const id = await client.submitJob('remove_watermark', 'document-1', 'user-1', {
        pdfPath: '/tmp/input.pdf',
      });
      await runUntil(client, events, EventKind.JobCompleted);

      const completion = events.find((x) => x.kind === EventKind.JobCompleted);
      expect(completion?.job.id).toBe(id);
      expect(completion?.job.status).toBe('completed');
      expect(client.statistics().numJobs).toBe(1);
      expect(completed).toBe(true);
      expect(driver.listen).toHaveBeenCalledWith('forensics_job_insert');
      expect(driver.open).toHaveBeenCalledTimes(1);
      expect(driver.close).toHaveBeenCalledTimes(1);
    });

    it('should publish scheduled retry', async () => {
      invoker.invoke.mockRejectedValue(new Error('disk full'));
      const client = new Client({ ...options, workDir });
      const events: Event[] = [];
      client.subscribe({ onNext: (event) => events.push(event) });

      const id = await client.submitJob('remove_watermark', 'document-1', 'user-1', {
        pdfPath: '/tmp/input.pdf',
      });
      await runUntil(client, events, EventKind.JobRetryScheduled);

      const job = await client.getJobStatus(id);
      expect(job?.status).toBe('failed');
      expect(job?.retryAt).not.toBeNull();
      expect(job?.error?.kind).toBe('internal');
      expect(client.statistics().numJobs).toBe(0);
    });

    it('should publish events to subscribers after a restart', async () => {
      invoker.invoke.mockResolvedValue(completedInvocation);
      const client = new Client({ ...options, workDir });
      await client.start();
      await client.stop();

      const events: Event[] = [];
      client.subscribe({ onNext: (event) => events.push(event) });
      const id = await client.submitJob('remove_watermark', 'document-1', 'user-1', {
        pdfPath: '/tmp/input.pdf',
      });
      await runUntil(client, events, EventKind.JobCompleted);

      expect(
        events.find((x) => x.kind === EventKind.JobCompleted)?.job.id,
      ).toBe(id);
    });
  });
});
