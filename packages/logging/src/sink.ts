import pino from 'pino';
import type { DestinationStream } from 'pino';
import { LogSinkOpenError } from './errors';

export const STDOUT_OUTPUT = 'stdout';
export const STDERR_OUTPUT = 'stderr';

const LOG_FILE_MODE = 0o755;

/**
 * Resolves an output setting to the stream records are written to.
 * "stdout" and "stderr" never touch the filesystem; anything else is a
 * path opened for append (created if missing) and kept open for the
 * lifetime of the process.
 */
export function resolveSink(output: string): DestinationStream {
  switch (output) {
    case STDOUT_OUTPUT:
      return process.stdout;
    case STDERR_OUTPUT:
      return process.stderr;
    default:
      return openFileSink(output);
  }
}

function openFileSink(path: string): DestinationStream {
  try {
    // A synchronous destination opens the file in its constructor.
    return pino.destination({ dest: path, append: true, mode: LOG_FILE_MODE, sync: true });
  } catch (error) {
    throw new LogSinkOpenError(path, error instanceof Error ? error.message : String(error));
  }
}
