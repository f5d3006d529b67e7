import type { Logger } from './logger';

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Runs `fn` on the first SIGINT/SIGTERM, then exits: 0 once `fn` settles,
 * 1 if it threw. Later signals are ignored while `fn` runs, so the handlers
 * stay installed until exit. Returns a function that removes them.
 */
export function onShutdown(
  logger: Logger,
  fn: (signal: NodeJS.Signals) => Promise<void> | void,
  exit: (code: number) => void = (code) => process.exit(code),
): () => void {
  let shuttingDown = false;

  const handler = async (signal: NodeJS.Signals) => {
    shuttingDown = true;
    logger.info('shutdown requested', 'signal', signal);

    let exitCode = 0;
    try {
      await fn(signal);
    } catch (error) {
      logger.error(
        'shutdown failed',
        error instanceof Error ? error : new Error(String(error)),
        'signal',
        signal,
      );
      exitCode = 1;
    }
    exit(exitCode);
  };

  const listener = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      logger.warn('shutdown already in progress', 'signal', signal);
      return;
    }
    void handler(signal);
  };

  const dispose = () => {
    for (const signal of SHUTDOWN_SIGNALS) {
      process.removeListener(signal, listener);
    }
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    process.on(signal, listener);
  }

  return dispose;
}
