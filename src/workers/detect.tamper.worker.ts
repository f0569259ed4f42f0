import path from 'node:path';
import { z } from 'zod';
import { ArtifactInfo, Job, JobResult } from '../types/job.js';
import { InvocationResult, ToolDefinition } from '../types/tool.js';
import { PreparedInvocation, ToolWorker, parseParams } from '../worker.js';

const paramsSchema = z.object({
  imagePath: z.string().min(1),
  saveNoiseprint: z.boolean().default(false),
});

export type DetectTamperParams = z.infer<typeof paramsSchema>;

const findMap = (artifacts: ArtifactInfo[], map: string) =>
  artifacts.find((x) => path.parse(x.name).name === map);

export class DetectTamperWorker implements ToolWorker {
  readonly kind = 'detect_tamper';

  constructor(private tool: ToolDefinition) {}

  validate(params: unknown): DetectTamperParams {
    return parseParams(paramsSchema, params);
  }

  prepare(job: Job): PreparedInvocation {
    const { imagePath, saveNoiseprint } = this.validate(job.params);
    return {
      tool: this.tool,
      inputs: { input_image: imagePath },
      options: { save_noiseprint: saveNoiseprint },
    };
  }

  interpret(job: Job, result: InvocationResult): JobResult {
    const { saveNoiseprint } = this.validate(job.params);
    const errors = result.success ? [] : [result.message];

    const maps = saveNoiseprint
      ? ['pred_map', 'conf_map', 'noiseprint']
      : ['pred_map', 'conf_map'];
    const summary: Record<string, string | null> = {};
    const artifacts: ArtifactInfo[] = [];
    for (const map of maps) {
      const artifact = findMap(result.artifacts, map);
      summary[map] = artifact ? artifact.path : null;
      if (artifact) {
        artifacts.push(artifact);
      } else {
        errors.push(`${map} was not produced`);
      }
    }

    return { artifacts, errors, summary };
  }
}
