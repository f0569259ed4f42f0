import { ArtifactInfo } from './job.js';
import { Dictionary } from '../util/util.types.js';

export type ToolOptionValue = string | number | boolean;

export type ToolOptions = Dictionary<ToolOptionValue>;

export interface ToolInputSpec {
  // Directory inside the container where the input's parent directory is mounted.
  mountPoint: string;
  // Environment variable receiving the input's path inside the container.
  env?: string;
}

export interface ToolOutputSpec {
  mountPoint: string;
  env?: string;
  // Only files matching are reported as artifacts.
  filter?: RegExp;
}

export interface ToolOptionSpec {
  name: string;
  flag: string;
  allowed: readonly ToolOptionValue[];
  // Boolean options emit the bare flag when true and nothing when false.
  boolean?: boolean;
}

export interface ToolArgsContext {
  // Input paths as seen inside the container, by role.
  inputs: Dictionary<string>;
  outputDir: string;
  options: ToolOptions;
}

/**
 * A containerized tool and its fixed CLI contract.
 */
export interface ToolDefinition {
  name: string;
  image: string;
  version: string;
  inputs: Dictionary<ToolInputSpec>;
  output: ToolOutputSpec;
  options: ToolOptionSpec[];
  args?: (context: ToolArgsContext) => string[];
}

export interface StatusReporter {
  report(message: string): Promise<void>;
}

export interface InvocationRequest {
  tool: ToolDefinition;
  // Host paths by input role.
  inputs: Dictionary<string>;
  options: ToolOptions;
  outputDir: string;
  timeout: number;
  signal?: AbortSignal;
  reporter?: StatusReporter;
}

export interface InvocationResult {
  success: boolean;
  message: string;
  exitCode: number;
  timedOut: boolean;
  artifacts: ArtifactInfo[];
  stdout: string;
  stderr: string;
}

export interface ToolInvoker {
  invoke(request: InvocationRequest): Promise<InvocationResult>;
  isAvailable(tool: ToolDefinition): Promise<boolean>;
}

export const toolReference = (tool: ToolDefinition): string =>
  `${tool.image}:${tool.version}`;
