import { anyAttr, stringAttr } from '../attributes';
import type { Logger } from '../logger';
import { NestLoggerAdapter } from './nest-logger.adapter';

describe('NestLoggerAdapter', () => {
  let logger: {
    debug: jest.Mock;
    info: jest.Mock;
    warn: jest.Mock;
    error: jest.Mock;
  };
  let adapter: NestLoggerAdapter;

  beforeEach(() => {
    logger = {
      debug: jest.fn(),
      info: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
    };
    adapter = new NestLoggerAdapter(logger as unknown as Logger);
  });

  it('should log at info with the Nest context', () => {
    adapter.log('Nest application successfully started', 'NestApplication');

    expect(logger.info).toHaveBeenCalledWith(
      'Nest application successfully started',
      stringAttr('context', 'NestApplication'),
    );
  });

  it('should map debug and verbose to debug', () => {
    adapter.debug('resolving providers');
    adapter.verbose('resolved');

    expect(logger.debug).toHaveBeenNthCalledWith(1, 'resolving providers');
    expect(logger.debug).toHaveBeenNthCalledWith(2, 'resolved');
  });

  it('should inspect non-string messages', () => {
    adapter.warn({ retries: 2 }, 'InstanceLoader');

    expect(logger.warn).toHaveBeenCalledWith(
      '{ retries: 2 }',
      stringAttr('context', 'InstanceLoader'),
    );
  });

  it('should keep extra parameters', () => {
    adapter.log('module loaded', { id: 1 }, 'InstanceLoader');

    expect(logger.info).toHaveBeenCalledWith(
      'module loaded',
      stringAttr('context', 'InstanceLoader'),
      anyAttr('params', [{ id: 1 }]),
    );
  });

  it('should pass the stack of a string error', () => {
    adapter.error('boom', 'Error: boom\n    at main.ts:1:1', 'ExceptionHandler');

    expect(logger.error).toHaveBeenCalledWith(
      'boom',
      null,
      stringAttr('context', 'ExceptionHandler'),
      stringAttr('stack', 'Error: boom\n    at main.ts:1:1'),
    );
  });

  it('should pass Error messages through as the error', () => {
    const err = new Error('kaput');

    adapter.error(err, 'Scheduler');

    expect(logger.error).toHaveBeenCalledWith('kaput', err, stringAttr('context', 'Scheduler'));
  });

  it('should log fatal messages as errors', () => {
    adapter.fatal('shutting down');

    expect(logger.error).toHaveBeenCalledWith('shutting down', null);
  });
});
