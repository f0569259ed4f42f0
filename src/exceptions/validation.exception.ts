import { JobRuntimeException } from './job.runtime.exception.js';

/**
 * Invalid runtime wiring or options, raised while components are constructed.
 */
export class ValidationException extends JobRuntimeException {
  constructor(message?: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
