import { DynamicModule, Module } from '@nestjs/common';
import { LoggingConfig, LoggingModule } from '@logfacade/logging';
import { WORKER_CONFIG, WorkerConfig } from './config';
import { WorkerService } from './worker.service';

@Module({})
export class AppModule {
  static register(logging: LoggingConfig, worker: WorkerConfig): DynamicModule {
    return {
      module: AppModule,
      imports: [LoggingModule.forRoot(logging)],
      providers: [{ provide: WORKER_CONFIG, useValue: worker }, WorkerService],
    };
  }
}
