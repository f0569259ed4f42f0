export { Client, ClientOptions, ClientStatistics, SubscribeOptions } from './client.js';
export { RuntimeConfig, loadConfig } from './config.js';
export { JobExecutor, JobExecutorContext, JobExecutorOptions, classifyOutcome } from './job.executor.js';
export { JobCompleter } from './job.completer.js';
export { JobRescuer } from './job.rescuer.js';
export { Scheduler } from './scheduler.js';
export { Producer } from './producer.js';
export { Notifier, NotificationTopic } from './notifier.js';
export { RetryPolicies, RetryPolicy } from './retry.policy.js';
export { ToolWorker, Workers, PreparedInvocation, parseParams } from './worker.js';
export { JobStatusReporter } from './status.reporter.js';
export * from './workers/index.js';
export * from './tools/builtin.tools.js';
export { DockerToolInvoker, ProcessLauncher, SpawnedProcess } from './tools/docker.invoker.js';
export { PostgresDbDriver } from './postgres/pg.db.driver.js';
export { PostgresJobStore } from './postgres/pg.job.store.js';
export { PostgresImageRepository } from './postgres/pg.image.repository.js';
export * from './types/job.js';
export * from './types/job.store.js';
export * from './types/tool.js';
export * from './types/event.js';
export * from './types/image.repository.js';
export { DbDriver } from './types/db.driver.js';
export { JobRuntimeException } from './exceptions/job.runtime.exception.js';
export { ValidationException } from './exceptions/validation.exception.js';
export { ConfigurationException } from './exceptions/configuration.exception.js';
export { InfrastructureException } from './exceptions/infrastructure.exception.js';
export { TimedoutJobException } from './exceptions/timedout.job.exception.js';
