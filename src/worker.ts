import { z, ZodTypeAny } from 'zod';
import { logger } from './logger/logger.settings.js';
import { Job, JobKind, JobParams, JobResult } from './types/job.js';
import {
  InvocationResult,
  ToolDefinition,
  ToolOptions,
} from './types/tool.js';
import { Dictionary } from './util/util.types.js';
import { ConfigurationException } from './exceptions/configuration.exception.js';

export interface PreparedInvocation {
  tool: ToolDefinition;
  inputs: Dictionary<string>;
  options: ToolOptions;
}

/**
 * Kind-specific part of job execution: turns stored params into a tool
 * invocation and the invocation's files into a job result.
 */
export interface ToolWorker {
  readonly kind: JobKind;
  // Throws ConfigurationException for invalid params.
  validate(params: unknown): JobParams;
  prepare(job: Job): PreparedInvocation;
  interpret(job: Job, result: InvocationResult): JobResult;
  // Creates the business records derived from a successful result.
  materialize?(job: Job, result: JobResult): Promise<void>;
}

export const parseParams = <S extends ZodTypeAny>(
  schema: S,
  params: unknown,
): z.infer<S> => {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationException(
      issue?.message ?? 'Invalid job parameters',
      issue && issue.path.length > 0 ? issue.path.join('.') : undefined,
    );
  }
  return parsed.data;
};

export class Workers {
  private workers = new Map<JobKind, ToolWorker>();

  addWorker(worker: ToolWorker) {
    if (this.workers.has(worker.kind)) {
      logger.warn(`Worker for kind already exists: ${worker.kind}`);
    }

    this.workers.set(worker.kind, worker);
  }

  getWorker(kind: JobKind): ToolWorker | undefined {
    return this.workers.get(kind);
  }

  getKinds(): JobKind[] {
    return [...this.workers.keys()];
  }
}
