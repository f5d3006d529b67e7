import type { ValidationError } from './validation/parse-or-throw';

export class LogSinkOpenError extends Error {
  constructor(
    public readonly path: string,
    public readonly reason: string,
  ) {
    super(`error opening log file ${path}: ${reason}`);
    this.name = 'LogSinkOpenError';
  }
}

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: ValidationError[],
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}
