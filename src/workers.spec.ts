import { mock } from 'jest-mock-extended';
import { Workers, parseParams } from './worker.js';
import { createDefaultWorkers } from './workers/index.js';
import { ExtractImagesWorker } from './workers/extract.images.worker.js';
import { DetectTamperWorker } from './workers/detect.tamper.worker.js';
import { RemoveWatermarkWorker } from './workers/remove.watermark.worker.js';
import {
  pdfExtractorTool,
  truforTool,
  watermarkRemovalTool,
} from './tools/builtin.tools.js';
import { ImageRepository } from './types/image.repository.js';
import { InvocationResult } from './types/tool.js';
import { ConfigurationException } from './exceptions/configuration.exception.js';
import { classifyOutcome } from './job.executor.js';
import { createFakeJob } from './util/test.helper.js';
import { z } from 'zod';

const invocation = (
  overrides: Partial<InvocationResult> = {},
): InvocationResult => ({
  success: true,
  message: 'Completed',
  exitCode: 0,
  timedOut: false,
  artifacts: [],
  stdout: '',
  stderr: '',
  ...overrides,
});

const artifact = (name: string) => ({
  name,
  path: `/work/output/${name}`,
  size: 100,
});

describe('workers', () => {
  describe('Workers', () => {
    it('should register workers by kind', () => {
      const workers = new Workers();
      const worker = new RemoveWatermarkWorker(watermarkRemovalTool());
      workers.addWorker(worker);

      expect(workers.getWorker('remove_watermark')).toBe(worker);
      expect(workers.getWorker('extract_images')).toBeUndefined();
      expect(workers.getKinds()).toEqual(['remove_watermark']);
    });

    it('should create a worker for every built-in job kind', () => {
      const workers = createDefaultWorkers(mock<ImageRepository>(), {
        trufor: { image: 'registry:5000/trufor', version: '2.0' },
      });

      expect(workers.getKinds()).toEqual([
        'extract_images',
        'detect_tamper',
        'remove_watermark',
      ]);
      const job = createFakeJob({
        kind: 'detect_tamper',
        params: { imagePath: '/tmp/image.png' },
      });
      expect(workers.getWorker('detect_tamper')?.prepare(job).tool.image).toBe(
        'registry:5000/trufor',
      );
    });
  });

  describe('parseParams', () => {
    const schema = z.object({ count: z.number().int() });

    it('should return parsed params', () => {
      expect(parseParams(schema, { count: 3 })).toEqual({ count: 3 });
    });

    it('should name the invalid field', () => {
      expect(() => parseParams(schema, { count: 'three' })).toThrow(
        new ConfigurationException('Expected number, received string', 'count'),
      );
    });

    it('should reject params that are not an object', () => {
      expect(() => parseParams(schema, null)).toThrow(ConfigurationException);
    });
  });

  describe('extract images', () => {
    const images = mock<ImageRepository>();
    const worker = new ExtractImagesWorker(pdfExtractorTool(), images);
    const job = createFakeJob({
      kind: 'extract_images',
      params: { pdfPath: '/tmp/report.pdf' },
    });

    it('should reject empty pdf path', () => {
      expect(() => worker.validate({ pdfPath: '' })).toThrow(
        ConfigurationException,
      );
    });

    it('should mount the pdf as input', () => {
      expect(worker.prepare(job)).toEqual({
        tool: pdfExtractorTool(),
        inputs: { input_pdf: '/tmp/report.pdf' },
        options: {},
      });
    });

    it('should report every extracted image', () => {
      const result = worker.interpret(
        job,
        invocation({ artifacts: [artifact('page-1.png'), artifact('page-2.png')] }),
      );

      expect(result).toEqual({
        artifacts: [artifact('page-1.png'), artifact('page-2.png')],
        errors: [],
        summary: { imageCount: 2, exitCode: 0 },
      });
    });

    it('should keep images of a failed run together with the error', () => {
      const result = worker.interpret(
        job,
        invocation({
          success: false,
          exitCode: 2,
          message: 'Tool exited with code 2',
          artifacts: [artifact('page-1.png')],
        }),
      );

      expect(result.errors).toEqual(['Tool exited with code 2']);
      expect(result.summary).toEqual({ imageCount: 1, exitCode: 2 });
    });
  });

  describe('detect tamper', () => {
    const worker = new DetectTamperWorker(truforTool());

    it('should default save noiseprint to false', () => {
      expect(worker.validate({ imagePath: '/tmp/image.png' })).toEqual({
        imagePath: '/tmp/image.png',
        saveNoiseprint: false,
      });
    });

    it('should pass noiseprint option to the tool', () => {
      const job = createFakeJob({
        kind: 'detect_tamper',
        params: { imagePath: '/tmp/image.png', saveNoiseprint: true },
      });

      expect(worker.prepare(job).options).toEqual({ save_noiseprint: true });
    });

    it('should report every map', () => {
      const job = createFakeJob({
        kind: 'detect_tamper',
        params: { imagePath: '/tmp/image.png' },
      });
      const result = worker.interpret(
        job,
        invocation({
          artifacts: [artifact('conf_map.png'), artifact('pred_map.png')],
        }),
      );

      expect(result.errors).toEqual([]);
      expect(result.artifacts).toEqual([
        artifact('pred_map.png'),
        artifact('conf_map.png'),
      ]);
      expect(result.summary).toEqual({
        pred_map: '/work/output/pred_map.png',
        conf_map: '/work/output/conf_map.png',
      });
    });

    it('should complete with errors when a map is missing', () => {
      const job = createFakeJob({
        kind: 'detect_tamper',
        params: { imagePath: '/tmp/image.png', saveNoiseprint: true },
      });
      const result = worker.interpret(
        job,
        invocation({ artifacts: [artifact('pred_map.png')] }),
      );

      expect(result.errors).toEqual([
        'conf_map was not produced',
        'noiseprint was not produced',
      ]);
      expect(result.summary).toEqual({
        pred_map: '/work/output/pred_map.png',
        conf_map: null,
        noiseprint: null,
      });
      expect(result.artifacts).toEqual([artifact('pred_map.png')]);
    });

    it('should fail when only unrelated files are produced', () => {
      const job = createFakeJob({
        kind: 'detect_tamper',
        params: { imagePath: '/tmp/image.png' },
      });
      const result = worker.interpret(
        job,
        invocation({ artifacts: [artifact('run.log')] }),
      );

      expect(result.artifacts).toEqual([]);
      expect(result.errors).toEqual([
        'pred_map was not produced',
        'conf_map was not produced',
      ]);
      expect(classifyOutcome(result)).toBe('failed');
    });
  });

  describe('remove watermark', () => {
    const worker = new RemoveWatermarkWorker(watermarkRemovalTool());

    it.each([0, 4, 1.5])('should reject aggressiveness %p', (aggressiveness) => {
      expect(() =>
        worker.validate({ pdfPath: '/tmp/input.pdf', aggressiveness }),
      ).toThrow(ConfigurationException);
    });

    it('should default aggressiveness to 2', () => {
      expect(worker.validate({ pdfPath: '/tmp/input.pdf' })).toEqual({
        pdfPath: '/tmp/input.pdf',
        aggressiveness: 2,
      });
    });

    it('should keep only the output named after input and mode', () => {
      const job = createFakeJob({
        params: { pdfPath: '/tmp/contract.pdf', aggressiveness: 3 },
      });
      const result = worker.interpret(
        job,
        invocation({
          artifacts: [
            artifact('contract_watermark_removed_m3.pdf'),
            artifact('debug.pdf'),
          ],
        }),
      );

      expect(result).toEqual({
        artifacts: [artifact('contract_watermark_removed_m3.pdf')],
        errors: [],
        summary: {
          outputPath: '/work/output/contract_watermark_removed_m3.pdf',
          aggressiveness: 3,
        },
      });
    });

    it('should have no artifacts when the expected output is missing', () => {
      const result = worker.interpret(
        createFakeJob(),
        invocation({ artifacts: [artifact('input_watermark_removed_m1.pdf')] }),
      );

      expect(result.artifacts).toEqual([]);
      expect(result.summary).toEqual({ outputPath: null, aggressiveness: 2 });
    });
  });
});
