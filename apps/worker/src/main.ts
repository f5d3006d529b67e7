import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import {
  LOGGER,
  Logger,
  NestLoggerAdapter,
  loadLoggingConfig,
  onShutdown,
} from '@logfacade/logging';
import { AppModule } from './app.module';
import { loadWorkerConfig } from './config';
import { WorkerService } from './worker.service';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(
    AppModule.register(loadLoggingConfig(), loadWorkerConfig()),
    { bufferLogs: true, abortOnError: false },
  );

  const logger = app.get<Logger>(LOGGER);
  app.useLogger(new NestLoggerAdapter(logger.withOperation('nest')));

  const workerService = app.get(WorkerService);

  onShutdown(logger, async () => {
    workerService.stop();
    await app.close();
    logger.info('worker stopped', 'service', 'worker');
  });
}

bootstrap().catch((err) => {
  console.error(err);
  process.exit(1);
});
