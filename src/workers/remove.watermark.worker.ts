import { z } from 'zod';
import { Job, JobResult } from '../types/job.js';
import { InvocationResult, ToolDefinition } from '../types/tool.js';
import { PreparedInvocation, ToolWorker, parseParams } from '../worker.js';
import { watermarkOutputName } from '../tools/builtin.tools.js';

const paramsSchema = z.object({
  pdfPath: z.string().min(1),
  aggressiveness: z.number().int().min(1).max(3).default(2),
});

export type RemoveWatermarkParams = z.infer<typeof paramsSchema>;

export class RemoveWatermarkWorker implements ToolWorker {
  readonly kind = 'remove_watermark';

  constructor(private tool: ToolDefinition) {}

  validate(params: unknown): RemoveWatermarkParams {
    return parseParams(paramsSchema, params);
  }

  prepare(job: Job): PreparedInvocation {
    const { pdfPath, aggressiveness } = this.validate(job.params);
    return {
      tool: this.tool,
      inputs: { input_pdf: pdfPath },
      options: { aggressiveness },
    };
  }

  // Only the file named after the input and mode counts as output.
  interpret(job: Job, result: InvocationResult): JobResult {
    const { pdfPath, aggressiveness } = this.validate(job.params);
    const expected = watermarkOutputName(pdfPath, aggressiveness);
    const output = result.artifacts.find((x) => x.name === expected);

    return {
      artifacts: output ? [output] : [],
      errors: result.success ? [] : [result.message],
      summary: {
        outputPath: output ? output.path : null,
        aggressiveness,
      },
    };
  }
}
