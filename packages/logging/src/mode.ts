export type Mode = 'dev' | 'prod';

export const DEV_MODE: Mode = 'dev';
export const PROD_MODE: Mode = 'prod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Maps a raw mode string to a Mode.
 * Anything other than "dev" or "prod" (including the empty string) is production.
 */
export function parseMode(raw: string): Mode {
  switch (raw) {
    case DEV_MODE:
      return DEV_MODE;
    case PROD_MODE:
      return PROD_MODE;
    default:
      return PROD_MODE;
  }
}

/**
 * Maps a mode to the verbosity floor the logger is built with.
 */
export function resolveVerbosity(mode: Mode): LogLevel {
  switch (mode) {
    case DEV_MODE:
      return 'debug';
    case PROD_MODE:
      return 'info';
    default:
      return 'info';
  }
}
