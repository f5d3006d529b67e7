export { Attribute, BAD_KEY, anyAttr, collectAttributes, groupAttr, stringAttr } from './attributes';
export { loadLoggingConfig, loggingEnvSchema, type LoggingConfig } from './config';
export { ConfigValidationError, LogSinkOpenError } from './errors';
export { ERROR_KEY, OPERATION_KEY, PROGRAM_INFO_KEY, initLogger, type Logger } from './logger';
export {
  DEV_MODE,
  LOG_LEVELS,
  PROD_MODE,
  parseMode,
  resolveVerbosity,
  type LogLevel,
  type Mode,
} from './mode';
export { LOGGER, LoggingModule } from './nest/logging.module';
export { NestLoggerAdapter } from './nest/nest-logger.adapter';
export { UNKNOWN_VERSION, readProgramInfo, type ProgramInfo } from './program-info';
export { onShutdown } from './runtime';
export { parseOrThrow } from './validation/parse-or-throw';
export { STDERR_OUTPUT, STDOUT_OUTPUT, resolveSink } from './sink';
export type { ValidationError } from './validation/parse-or-throw';
