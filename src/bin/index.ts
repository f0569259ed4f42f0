#!/usr/bin/env node
import fs from 'node:fs/promises';
import path from 'node:path';
import { Command } from 'commander';
import Knex from 'knex';
import { Client } from '../client.js';
import { RuntimeConfig, loadConfig } from '../config.js';
import { DockerToolInvoker } from '../tools/docker.invoker.js';
import {
  pdfExtractorTool,
  truforTool,
  watermarkRemovalTool,
} from '../tools/builtin.tools.js';
import { toolReference } from '../types/tool.js';
import { ConfigurationException } from '../exceptions/configuration.exception.js';
import { setLogLevel } from '../logger/logger.settings.js';

const program = new Command();

program
  .name('forensics-jobs')
  .description('Forensics job runtime: database migrations, worker and job tools');

const createKnex = (databaseUrl: string) =>
  Knex({
    client: 'pg',
    connection: {
      connectionString: databaseUrl,
    },
    migrations: {
      directory: path.join(__dirname, '..', 'migrations'),
      loadExtensions: ['.js'],
    },
  });

const resolveDatabaseUrl = (databaseUrl?: string): string => {
  const url = databaseUrl || loadConfig().databaseUrl;
  if (!url) {
    throw new ConfigurationException(
      'Database URL is not supplied',
      'FORENSICS_DATABASE_URL',
    );
  }
  return url;
};

const createClient = (config: RuntimeConfig) =>
  new Client({
    dbUri: resolveDatabaseUrl(config.databaseUrl),
    id: config.workerId,
    workDir: config.workDir,
    softTimeLimit: config.softTimeLimit,
    hardTimeLimit: config.hardTimeLimit,
    maxRetries: config.maxRetries,
    retryBaseDelay: config.retryBaseDelay,
    rescueInterval: config.rescueInterval,
    invoker: new DockerToolInvoker({ dockerBinary: config.dockerBinary }),
    tools: config.tools,
    logLevel: config.logLevel,
  });

const fail = (error: unknown) => {
  console.error(`${error}`);
  process.exitCode = 1;
};

const migrate = program
  .command('migrate')
  .description('Manages the database schema of the job tables.');

migrate
  .command('up')
  .description('Runs the next migration that has not yet be run.')
  .argument('[databaseUrl]', 'connection string to desired database schema')
  .action(async (databaseUrl?: string) => {
    try {
      const knex = createKnex(resolveDatabaseUrl(databaseUrl));
      try {
        await knex.migrate.up();
        const currentVersion = await knex.migrate.currentVersion();
        console.log(`Database schema is migrated to version: ${currentVersion}`);
      } finally {
        await knex.destroy();
      }
    } catch (e) {
      fail(e);
    }
  });

migrate
  .command('down')
  .description('Will undo the last migration that was run.')
  .argument('[databaseUrl]', 'connection string to desired database schema')
  .action(async (databaseUrl?: string) => {
    try {
      const knex = createKnex(resolveDatabaseUrl(databaseUrl));
      try {
        await knex.migrate.down();
        const currentVersion = await knex.migrate.currentVersion();
        console.log(
          `Database schema is downgraded to version: ${currentVersion}`,
        );
      } finally {
        await knex.destroy();
      }
    } catch (e) {
      fail(e);
    }
  });

migrate
  .command('current')
  .argument('[databaseUrl]', 'connection string to desired database schema')
  .description(
    `Retrieves and returns the current migration version. If there aren't any migrations run yet, returns "none" as the value for the current version.`,
  )
  .action(async (databaseUrl?: string) => {
    try {
      const knex = createKnex(resolveDatabaseUrl(databaseUrl));
      try {
        const currentVersion = await knex.migrate.currentVersion();
        console.log(`Current database migration version: ${currentVersion}`);
      } finally {
        await knex.destroy();
      }
    } catch (e) {
      fail(e);
    }
  });

program
  .command('worker')
  .description('Executes jobs until SIGINT or SIGTERM is received.')
  .action(async () => {
    try {
      const config = loadConfig();
      const client = createClient(config);
      await client.start();
      console.log(`Worker ${config.workerId} started`);

      await new Promise<void>((resolve) => {
        process.once('SIGINT', () => resolve());
        process.once('SIGTERM', () => resolve());
      });

      console.log(`Worker ${config.workerId} is stopping`);
      await client.stop();
    } catch (e) {
      fail(e);
    }
  });

program
  .command('submit')
  .description('Submits a job and prints its id.')
  .argument('<kind>', 'extract_images, detect_tamper or remove_watermark')
  .argument('<subjectId>', 'document or image the job belongs to')
  .argument('<ownerId>', 'user submitting the job')
  .option('-p, --params <json>', 'job parameters as JSON', '{}')
  .action(
    async (
      kind: string,
      subjectId: string,
      ownerId: string,
      options: { params: string },
    ) => {
      try {
        let params: unknown;
        try {
          params = JSON.parse(options.params);
        } catch {
          throw new ConfigurationException('Not valid JSON', 'params');
        }

        const client = createClient(loadConfig());
        await client.connect();
        try {
          console.log(await client.submitJob(kind, subjectId, ownerId, params));
        } finally {
          await client.stop();
        }
      } catch (e) {
        fail(e);
      }
    },
  );

program
  .command('status')
  .description('Prints a job as JSON.')
  .argument('<jobId>', 'id returned by submit')
  .action(async (jobId: string) => {
    try {
      const client = createClient(loadConfig());
      await client.connect();
      try {
        const job = await client.getJobStatus(jobId);
        if (job) {
          console.log(JSON.stringify(job, null, 2));
        } else {
          console.error(`Job not found: ${jobId}`);
          process.exitCode = 1;
        }
      } finally {
        await client.stop();
      }
    } catch (e) {
      fail(e);
    }
  });

program
  .command('doctor')
  .description('Checks that docker can run every tool image.')
  .action(async () => {
    try {
      const config = loadConfig();
      setLogLevel(config.logLevel);
      const invoker = new DockerToolInvoker({
        dockerBinary: config.dockerBinary,
      });
      const tools = [
        pdfExtractorTool(config.tools.pdfExtractor),
        truforTool(config.tools.trufor),
        watermarkRemovalTool(config.tools.watermarkRemoval),
      ];

      for (const tool of tools) {
        const available = await invoker.isAvailable(tool);
        console.log(
          `${toolReference(tool)}: ${available ? 'available' : 'missing'}`,
        );
        if (!available) {
          process.exitCode = 1;
        }
      }
    } catch (e) {
      fail(e);
    }
  });

program
  .command('version')
  .description(`Retrieves and returns the current version of the runtime.`)
  .action(async () => {
    try {
      const content = await fs.readFile(
        path.join(__dirname, '..', '..', 'package.json'),
        'utf8',
      );
      const pkgJson: unknown = JSON.parse(content);
      const version =
        typeof pkgJson === 'object' &&
        pkgJson !== null &&
        'version' in pkgJson &&
        typeof pkgJson.version === 'string'
          ? pkgJson.version
          : 'unknown';
      console.log(`Forensics job runtime version: ${version}`);
    } catch (e) {
      fail(e);
    }
  });

program.parseAsync(process.argv).catch(fail);
