import pino from 'pino';
import type { DestinationStream } from 'pino';
import { prettyFactory } from 'pino-pretty';
import { Attribute, anyAttr, collectAttributes, groupAttr, stringAttr } from './attributes';
import type { LogLevel } from './mode';
import { readProgramInfo } from './program-info';
import { resolveSink } from './sink';

export const ERROR_KEY = 'error';
export const OPERATION_KEY = 'operation';
export const PROGRAM_INFO_KEY = 'program_info';

/** Rendered as e.g. "3:04PM", in local time. */
const KITCHEN_TIME_FORMAT = 'SYS:h:MMTT';

/**
 * Leveled, attribute-carrying logger.
 *
 * Variadic `attributes` are Attribute values or alternating key/value
 * arguments. Derivations (`with`, `withOperation`) return a new logger and
 * leave the receiver untouched.
 */
export interface Logger {
  debug(msg: string, ...attributes: unknown[]): void;
  info(msg: string, ...attributes: unknown[]): void;
  warn(msg: string, ...attributes: unknown[]): void;
  error(msg: string, err: Error | null | undefined, ...attributes: unknown[]): void;
  logAndReturnError<E extends Error | null | undefined>(
    msg: string,
    err: E,
    ...attributes: unknown[]
  ): E;
  withOperation(operation: string): Logger;
  with(...attributes: unknown[]): Logger;
  stringAttr(key: string, value: string): Attribute;
  anyAttr(key: string, value: unknown): Attribute;
}

/**
 * Builds the process logger.
 *
 * `debug` gets the colorized pretty renderer, `info`/`warn`/`error` get
 * JSON lines with that level as the floor. Throws LogSinkOpenError when
 * `output` is a path that cannot be opened.
 */
export function initLogger(level: LogLevel, output: string): Logger {
  const sink = resolveSink(output);
  const programInfo = readProgramInfo();

  const backend = createBackend(level, sink).child(
    collectAttributes([
      groupAttr(
        PROGRAM_INFO_KEY,
        stringAttr('version', programInfo.version),
        stringAttr('node_version', programInfo.node_version),
      ),
    ]),
  );

  return new PinoLogger(backend);
}

function createBackend(level: LogLevel, sink: DestinationStream): pino.Logger {
  switch (level) {
    case 'info':
    case 'warn':
    case 'error':
      return pino(
        {
          level,
          base: undefined,
          timestamp: pino.stdTimeFunctions.isoTime,
          formatters: {
            level: (label) => ({ level: label.toUpperCase() }),
          },
        },
        sink,
      );
    default:
      return pino(
        {
          level: 'debug',
          base: undefined,
          timestamp: pino.stdTimeFunctions.isoTime,
        },
        prettySink(sink),
      );
  }
}

function prettySink(sink: DestinationStream): DestinationStream {
  const prettify = prettyFactory({
    colorize: true,
    singleLine: true,
    translateTime: KITCHEN_TIME_FORMAT,
  });

  return {
    write(line: string) {
      sink.write(prettify(line));
    },
  };
}

class PinoLogger implements Logger {
  constructor(private readonly backend: pino.Logger) {}

  debug(msg: string, ...attributes: unknown[]): void {
    this.backend.debug(collectAttributes(attributes), msg);
  }

  info(msg: string, ...attributes: unknown[]): void {
    this.backend.info(collectAttributes(attributes), msg);
  }

  warn(msg: string, ...attributes: unknown[]): void {
    this.backend.warn(collectAttributes(attributes), msg);
  }

  error(msg: string, err: Error | null | undefined, ...attributes: unknown[]): void {
    const errorText = err == null ? 'nil' : err.message;
    this.backend.error(
      collectAttributes([...attributes, stringAttr(ERROR_KEY, errorText)]),
      msg,
    );
  }

  logAndReturnError<E extends Error | null | undefined>(
    msg: string,
    err: E,
    ...attributes: unknown[]
  ): E {
    this.error(msg, err, ...attributes);
    return err;
  }

  withOperation(operation: string): Logger {
    return this.with(stringAttr(OPERATION_KEY, operation));
  }

  with(...attributes: unknown[]): Logger {
    return new PinoLogger(this.backend.child(collectAttributes(attributes)));
  }

  stringAttr(key: string, value: string): Attribute {
    return stringAttr(key, value);
  }

  anyAttr(key: string, value: unknown): Attribute {
    return anyAttr(key, value);
  }
}
