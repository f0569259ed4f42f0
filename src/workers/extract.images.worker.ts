import { z } from 'zod';
import { Job, JobResult } from '../types/job.js';
import { ImageRepository } from '../types/image.repository.js';
import { InvocationResult, ToolDefinition } from '../types/tool.js';
import { PreparedInvocation, ToolWorker, parseParams } from '../worker.js';

const paramsSchema = z.object({
  pdfPath: z.string().min(1),
});

export type ExtractImagesParams = z.infer<typeof paramsSchema>;

export class ExtractImagesWorker implements ToolWorker {
  readonly kind = 'extract_images';

  constructor(
    private tool: ToolDefinition,
    private images: ImageRepository,
  ) {}

  validate(params: unknown): ExtractImagesParams {
    return parseParams(paramsSchema, params);
  }

  prepare(job: Job): PreparedInvocation {
    const { pdfPath } = this.validate(job.params);
    return {
      tool: this.tool,
      inputs: { input_pdf: pdfPath },
      options: {},
    };
  }

  interpret(_job: Job, result: InvocationResult): JobResult {
    return {
      artifacts: result.artifacts,
      errors: result.success ? [] : [result.message],
      summary: {
        imageCount: result.artifacts.length,
        exitCode: result.exitCode,
      },
    };
  }

  async materialize(job: Job, result: JobResult): Promise<void> {
    await this.images.insertExtractedImages(
      result.artifacts.map((artifact) => ({
        ownerId: job.ownerId,
        documentId: job.subjectId,
        jobId: job.id,
        filename: artifact.name,
        filePath: artifact.path,
        fileSize: artifact.size,
      })),
    );
  }
}
