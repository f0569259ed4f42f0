import { JobRuntimeException } from './job.runtime.exception.js';

export class TimedoutJobException extends JobRuntimeException {
  constructor(private readonly limit: number) {
    super(`Timed out after ${limit}ms`);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  public get limitMs(): number {
    return this.limit;
  }
}
