import { DynamicModule, Global, Module } from '@nestjs/common';
import type { LoggingConfig } from '../config';
import { initLogger } from '../logger';

export const LOGGER = Symbol('LOGGER');

@Global()
@Module({})
export class LoggingModule {
  /**
   * Provides the process logger under the LOGGER token to every module.
   */
  static forRoot(config: Pick<LoggingConfig, 'level' | 'output'>): DynamicModule {
    return {
      module: LoggingModule,
      providers: [
        {
          provide: LOGGER,
          useFactory: () => initLogger(config.level, config.output),
        },
      ],
      exports: [LOGGER],
    };
  }
}
