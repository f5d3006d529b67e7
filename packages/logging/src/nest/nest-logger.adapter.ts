import { inspect } from 'node:util';
import type { LoggerService } from '@nestjs/common';
import { Attribute, anyAttr, stringAttr } from '../attributes';
import type { Logger } from '../logger';

/**
 * Routes Nest's own messages through the logger.
 * Nest passes the context name as the last string parameter; for errors
 * the parameter before it is the stack trace.
 */
export class NestLoggerAdapter implements LoggerService {
  constructor(private readonly logger: Logger) {}

  log(message: unknown, ...optionalParams: unknown[]): void {
    this.logger.info(describe(message), ...paramsToAttributes(optionalParams));
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.logger.debug(describe(message), ...paramsToAttributes(optionalParams));
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.logger.debug(describe(message), ...paramsToAttributes(optionalParams));
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.logger.warn(describe(message), ...paramsToAttributes(optionalParams));
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    const err = message instanceof Error ? message : null;
    const { context, rest } = splitContext(optionalParams);
    const attributes: Attribute[] = context === undefined ? [] : [stringAttr('context', context)];

    const [stack, ...extra] = rest;
    if (typeof stack === 'string') {
      attributes.push(stringAttr('stack', stack));
    } else if (stack !== undefined) {
      extra.unshift(stack);
    }
    if (extra.length > 0) {
      attributes.push(anyAttr('params', extra));
    }

    this.logger.error(describe(message), err, ...attributes);
  }

  fatal(message: unknown, ...optionalParams: unknown[]): void {
    this.error(message, ...optionalParams);
  }
}

function describe(message: unknown): string {
  if (typeof message === 'string') {
    return message;
  }
  if (message instanceof Error) {
    return message.message;
  }
  return inspect(message);
}

function splitContext(params: unknown[]): { context?: string; rest: unknown[] } {
  const last = params[params.length - 1];
  if (typeof last === 'string') {
    return { context: last, rest: params.slice(0, -1) };
  }
  return { rest: params };
}

function paramsToAttributes(params: unknown[]): Attribute[] {
  const { context, rest } = splitContext(params);
  const attributes: Attribute[] = context === undefined ? [] : [stringAttr('context', context)];
  if (rest.length > 0) {
    attributes.push(anyAttr('params', rest));
  }
  return attributes;
}
