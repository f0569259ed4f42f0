import { JobRuntimeException } from './job.runtime.exception.js';

/**
 * Invalid job parameters or tool options. Raised before any subprocess is
 * started and never retried.
 */
export class ConfigurationException extends JobRuntimeException {
  constructor(
    message: string,
    private readonly parameter?: string,
  ) {
    super(parameter ? `${parameter}: ${message}` : message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  public get field(): string | undefined {
    return this.parameter;
  }
}
