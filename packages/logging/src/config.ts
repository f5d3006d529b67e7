import { z } from 'zod';
import { LOG_LEVELS, PROD_MODE, parseMode, resolveVerbosity } from './mode';
import type { LogLevel, Mode } from './mode';
import { STDOUT_OUTPUT } from './sink';
import { parseOrThrow } from './validation/parse-or-throw';

export const loggingEnvSchema = z.object({
  LOG_MODE: z.string().default(PROD_MODE),
  LOG_OUTPUT: z.string().trim().min(1).default(STDOUT_OUTPUT),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export interface LoggingConfig {
  mode: Mode;
  level: LogLevel;
  output: string;
}

/**
 * Reads LOG_MODE, LOG_OUTPUT and LOG_LEVEL.
 * An unrecognized LOG_MODE means production; LOG_LEVEL, when set, wins
 * over the level derived from the mode.
 */
export function loadLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const parsed = parseOrThrow(loggingEnvSchema, env, {
    message: 'Invalid logging configuration',
  });
  const mode = parseMode(parsed.LOG_MODE);

  return {
    mode,
    level: parsed.LOG_LEVEL ?? resolveVerbosity(mode),
    output: parsed.LOG_OUTPUT,
  };
}
