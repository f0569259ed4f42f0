import os from 'node:os';
import dotenv from 'dotenv';
import { cleanEnv, num, str } from 'envalid';
import { LOG_LEVEL_NAMES } from './logger/logger.settings.js';
import { ValidationException } from './exceptions/validation.exception.js';
import { parseImageReference } from './tools/builtin.tools.js';
import { ToolOverrides } from './workers/index.js';

export interface RuntimeConfig {
  databaseUrl: string;
  workerId: string;
  workDir: string;
  softTimeLimit: number;
  hardTimeLimit: number;
  maxRetries: number;
  retryBaseDelay: number;
  rescueInterval: number;
  logLevel: (typeof LOG_LEVEL_NAMES)[number];
  dockerBinary: string;
  tools: ToolOverrides;
}

/**
 * Reads the runtime configuration from environment variables. Without an
 * explicit environment, a `.env` file in the working directory is loaded
 * into `process.env` first.
 */
export const loadConfig = (env?: NodeJS.ProcessEnv): RuntimeConfig => {
  if (!env) {
    dotenv.config();
  }

  const config = cleanEnv(
    env ?? process.env,
    {
      FORENSICS_DATABASE_URL: str({
        desc: 'PostgreSQL connection string',
        default: '',
      }),
      FORENSICS_WORKER_ID: str({
        desc: 'Worker id recorded on claimed jobs',
        default: `${os.hostname()}-${process.pid}`,
      }),
      FORENSICS_WORK_DIR: str({
        desc: 'Root directory of job outputs',
        default: 'work',
      }),
      FORENSICS_SOFT_TIME_LIMIT_MS: num({ default: 25 * 60 * 1_000 }),
      FORENSICS_HARD_TIME_LIMIT_MS: num({ default: 30 * 60 * 1_000 }),
      FORENSICS_MAX_RETRIES: num({ default: 3 }),
      FORENSICS_RETRY_BASE_DELAY_MS: num({ default: 60 * 1_000 }),
      FORENSICS_RESCUE_INTERVAL_MS: num({ default: 60 * 1_000 }),
      FORENSICS_LOG_LEVEL: str({ choices: LOG_LEVEL_NAMES, default: 'info' }),
      FORENSICS_DOCKER_BINARY: str({ default: 'docker' }),
      FORENSICS_PDF_EXTRACTOR_IMAGE: str({ default: 'pdf-extractor:latest' }),
      FORENSICS_TRUFOR_IMAGE: str({ default: 'trufor:latest' }),
      FORENSICS_WATERMARK_REMOVAL_IMAGE: str({
        default: 'pdf-watermark-removal:latest',
      }),
    },
    {
      reporter: ({ errors }) => {
        const invalid = Object.keys(errors);
        if (invalid.length > 0) {
          throw new ValidationException(
            `Invalid environment variables: ${invalid.join(', ')}`,
          );
        }
      },
    },
  );

  return {
    databaseUrl: config.FORENSICS_DATABASE_URL,
    workerId: config.FORENSICS_WORKER_ID,
    workDir: config.FORENSICS_WORK_DIR,
    softTimeLimit: config.FORENSICS_SOFT_TIME_LIMIT_MS,
    hardTimeLimit: config.FORENSICS_HARD_TIME_LIMIT_MS,
    maxRetries: config.FORENSICS_MAX_RETRIES,
    retryBaseDelay: config.FORENSICS_RETRY_BASE_DELAY_MS,
    rescueInterval: config.FORENSICS_RESCUE_INTERVAL_MS,
    logLevel: config.FORENSICS_LOG_LEVEL,
    dockerBinary: config.FORENSICS_DOCKER_BINARY,
    tools: {
      pdfExtractor: parseImageReference(config.FORENSICS_PDF_EXTRACTOR_IMAGE),
      trufor: parseImageReference(config.FORENSICS_TRUFOR_IMAGE),
      watermarkRemoval: parseImageReference(
        config.FORENSICS_WATERMARK_REMOVAL_IMAGE,
      ),
    },
  };
};
