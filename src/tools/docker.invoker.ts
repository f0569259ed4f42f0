import { spawn } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { Readable } from 'node:stream';
import throttle from 'lodash.throttle';
import {
  InvocationRequest,
  InvocationResult,
  StatusReporter,
  ToolDefinition,
  ToolInvoker,
  ToolOptions,
  toolReference,
} from '../types/tool.js';
import { ConfigurationException } from '../exceptions/configuration.exception.js';
import { InfrastructureException } from '../exceptions/infrastructure.exception.js';
import { ValidationException } from '../exceptions/validation.exception.js';
import { logger } from '../logger/logger.settings.js';
import { Dictionary, Nullable } from '../util/util.types.js';
import { collectArtifacts, isNotFound } from './artifacts.js';

export interface SpawnedProcess {
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal: NodeJS.Signals): boolean;
  onError(listener: (error: Error) => void): void;
  onClose(
    listener: (code: Nullable<number>, signal: Nullable<NodeJS.Signals>) => void,
  ): void;
}

export type ProcessLauncher = (
  command: string,
  args: string[],
) => SpawnedProcess;

export const spawnProcess: ProcessLauncher = (command, args) => {
  const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
  return {
    stdout: child.stdout,
    stderr: child.stderr,
    kill: (signal) => child.kill(signal),
    onError: (listener) => {
      child.on('error', listener);
    },
    onClose: (listener) => {
      child.on('close', listener);
    },
  };
};

export interface DockerToolInvokerOptions {
  dockerBinary: string;
  // Time between SIGTERM and SIGKILL when a run is torn down.
  killGracePeriod: number;
  // Minimum time between two progress messages forwarded from stdout.
  reportInterval: number;
  // Captured stdout/stderr is truncated to its last `outputLimit` characters.
  outputLimit: number;
}

export const DEFAULT_DOCKER_INVOKER_OPTIONS: DockerToolInvokerOptions = {
  dockerBinary: 'docker',
  killGracePeriod: 10_000,
  reportInterval: 1_000,
  outputLimit: 64 * 1024,
};

// Exit codes docker itself uses for daemon errors, a non-executable command
// and a command that cannot be found.
const DOCKER_FAILURE_EXIT_CODES = [125, 126, 127];

interface RunOutcome {
  exitCode: number;
  timedOut: boolean;
  stdout: string;
  stderr: string;
}

/**
 * Runs containerized tools through the docker CLI. Every run gets a unique
 * container name so that it can be removed on timeout.
 */
export class DockerToolInvoker implements ToolInvoker {
  private options: DockerToolInvokerOptions;

  constructor(
    options: Partial<DockerToolInvokerOptions> = {},
    private launcher: ProcessLauncher = spawnProcess,
  ) {
    this.options = { ...DEFAULT_DOCKER_INVOKER_OPTIONS, ...options };

    if (!this.options.dockerBinary) {
      throw new ValidationException('Docker binary cannot be empty');
    }

    if (this.options.killGracePeriod < 0) {
      throw new ValidationException('Kill grace period is less then 0');
    }

    if (this.options.reportInterval <= 0) {
      throw new ValidationException(
        'Report interval is equal or less then 0',
      );
    }
  }

  async invoke(request: InvocationRequest): Promise<InvocationResult> {
    const { tool } = request;
    const optionArgs = this.buildOptionArgs(tool, request.options);
    const inputs = await this.resolveInputs(tool, request.inputs);

    await fs.mkdir(request.outputDir, { recursive: true });

    const containerName = `${tool.name}-${randomUUID()}`;
    const toolArgs = tool.args
      ? tool.args({
          inputs: inputs.containerPaths,
          outputDir: tool.output.mountPoint,
          options: request.options,
        })
      : [];
    const args = [
      'run',
      '--rm',
      '--name',
      containerName,
      ...inputs.mountArgs,
      '-v',
      `${path.resolve(request.outputDir)}:${tool.output.mountPoint}`,
      ...(tool.output.env
        ? ['-e', `${tool.output.env}=${tool.output.mountPoint}`]
        : []),
      toolReference(tool),
      ...toolArgs,
      ...optionArgs,
    ];

    logger.debug(`Running tool ${toolReference(tool)} as ${containerName}`);
    const outcome = await this.run(args, containerName, request);

    if (outcome.timedOut) {
      logger.warn(`Tool ${tool.name} timed out, container ${containerName}`);
      return {
        success: false,
        message: `Timeout after ${request.timeout}ms`,
        exitCode: outcome.exitCode,
        timedOut: true,
        artifacts: [],
        stdout: outcome.stdout,
        stderr: outcome.stderr,
      };
    }

    if (DOCKER_FAILURE_EXIT_CODES.includes(outcome.exitCode)) {
      throw new InfrastructureException(
        'docker',
        outcome.stderr.trim() || `exited with code ${outcome.exitCode}`,
      );
    }

    const artifacts = await collectArtifacts(
      request.outputDir,
      tool.output.filter,
    );
    const success = outcome.exitCode === 0;

    return {
      success,
      message: success
        ? `Completed with ${artifacts.length} output file(s)`
        : `Tool exited with code ${outcome.exitCode}`,
      exitCode: outcome.exitCode,
      timedOut: false,
      artifacts,
      stdout: outcome.stdout,
      stderr: outcome.stderr,
    };
  }

  async isAvailable(tool: ToolDefinition): Promise<boolean> {
    try {
      const outcome = await this.run(
        ['image', 'inspect', toolReference(tool)],
        null,
        { timeout: 30_000 },
      );
      return outcome.exitCode === 0;
    } catch (error) {
      logger.warn(`Docker is not available: `, error);
      return false;
    }
  }

  buildOptionArgs(tool: ToolDefinition, options: ToolOptions): string[] {
    const args: string[] = [];

    for (const [name, value] of Object.entries(options)) {
      const spec = tool.options.find((x) => x.name === name);
      if (!spec) {
        throw new ConfigurationException(
          `Unknown option for tool ${tool.name}`,
          name,
        );
      }

      if (!spec.allowed.includes(value)) {
        throw new ConfigurationException(
          `Value ${String(value)} is not one of: ${spec.allowed.join(', ')}`,
          name,
        );
      }

      if (spec.boolean) {
        if (value === true) {
          args.push(spec.flag);
        }
      } else {
        args.push(spec.flag, String(value));
      }
    }

    return args;
  }

  private async resolveInputs(
    tool: ToolDefinition,
    inputs: Dictionary<string>,
  ): Promise<{ mountArgs: string[]; containerPaths: Dictionary<string> }> {
    const mountArgs: string[] = [];
    const containerPaths: Dictionary<string> = {};

    for (const [role, spec] of Object.entries(tool.inputs)) {
      const hostPath = inputs[role];
      if (!hostPath) {
        throw new ConfigurationException(
          `Missing input for tool ${tool.name}`,
          role,
        );
      }

      try {
        const stats = await fs.stat(hostPath);
        if (!stats.isFile()) {
          throw new ConfigurationException(
            `Input is not a file: ${hostPath}`,
            role,
          );
        }
      } catch (error) {
        if (isNotFound(error)) {
          throw new ConfigurationException(
            `Input file not found: ${hostPath}`,
            role,
          );
        }
        throw error;
      }

      const absolute = path.resolve(hostPath);
      const containerPath = path.posix.join(
        spec.mountPoint,
        path.basename(absolute),
      );
      containerPaths[role] = containerPath;
      mountArgs.push('-v', `${path.dirname(absolute)}:${spec.mountPoint}:ro`);
      if (spec.env) {
        mountArgs.push('-e', `${spec.env}=${containerPath}`);
      }
    }

    return { mountArgs, containerPaths };
  }

  private run(
    args: string[],
    containerName: Nullable<string>,
    request: {
      timeout: number;
      signal?: AbortSignal;
      reporter?: StatusReporter;
    },
  ): Promise<RunOutcome> {
    return new Promise<RunOutcome>((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let pendingLine = '';
      let timedOut = false;
      let settled = false;
      let killTimer: Nullable<NodeJS.Timeout> = null;

      const report = throttle((line: string) => {
        request.reporter?.report(line).catch((error: unknown) => {
          logger.warn('Failed to report tool progress: ', error);
        });
      }, this.options.reportInterval);

      const child = this.launcher(this.options.dockerBinary, args);

      const teardown = () => {
        if (timedOut || settled) {
          return;
        }
        timedOut = true;
        if (containerName) {
          this.removeContainer(containerName);
        }
        child.kill('SIGTERM');
        killTimer = setTimeout(
          () => child.kill('SIGKILL'),
          this.options.killGracePeriod,
        );
      };

      const timeoutTimer = setTimeout(teardown, request.timeout);
      request.signal?.addEventListener('abort', teardown);
      if (request.signal?.aborted) {
        teardown();
      }

      const finish = () => {
        settled = true;
        clearTimeout(timeoutTimer);
        if (killTimer) {
          clearTimeout(killTimer);
        }
        request.signal?.removeEventListener('abort', teardown);
        report.flush();
        report.cancel();
      };

      child.stdout.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout = this.truncate(stdout + chunk);
        const lines = (pendingLine + chunk).split(/\r?\n/);
        pendingLine = lines.pop() ?? '';
        const last = lines.map((x) => x.trim()).filter(Boolean).pop();
        if (last) {
          report(last);
        }
      });

      child.stderr.setEncoding('utf8');
      child.stderr.on('data', (chunk: string) => {
        stderr = this.truncate(stderr + chunk);
      });

      child.onError((error) => {
        if (settled) {
          return;
        }
        finish();
        reject(new InfrastructureException('docker', error.message));
      });

      child.onClose((code) => {
        if (settled) {
          return;
        }
        finish();
        resolve({ exitCode: code ?? -1, timedOut, stdout, stderr });
      });
    });
  }

  private removeContainer(containerName: string) {
    const remover = this.launcher(this.options.dockerBinary, [
      'rm',
      '-f',
      containerName,
    ]);
    remover.stdout.resume();
    remover.stderr.resume();
    remover.onError((error) =>
      logger.warn(`Failed to remove container ${containerName}: `, error),
    );
  }

  private truncate(value: string): string {
    return value.length > this.options.outputLimit
      ? value.slice(value.length - this.options.outputLimit)
      : value;
  }
}
