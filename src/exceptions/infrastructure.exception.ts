import { JobRuntimeException } from './job.runtime.exception.js';

export class InfrastructureException extends JobRuntimeException {
  constructor(
    private readonly service: string,
    message?: string,
  ) {
    super(
      message
        ? `${service} service error: ${message}`
        : `${service} service unavailable`,
    );
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  public get serviceName(): string {
    return this.service;
  }
}
