import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import { LOGGER, Logger } from '@logfacade/logging';
import { WORKER_CONFIG, WorkerConfig } from './config';

@Injectable()
export class WorkerService implements OnModuleInit {
  private isRunning = false;
  private ticks = 0;
  private readonly startedAt = Date.now();
  private readonly logger: Logger;

  constructor(
    @Inject(LOGGER) logger: Logger,
    @Inject(WORKER_CONFIG) private readonly config: WorkerConfig,
  ) {
    this.logger = logger.with('service', 'worker');
  }

  onModuleInit() {
    this.isRunning = true;
    this.logger.info(
      'worker started',
      this.logger.anyAttr('heartbeat_interval_ms', this.config.heartbeatIntervalMs),
    );
    void this.run();
  }

  stop() {
    this.isRunning = false;
  }

  /**
   * Logs one heartbeat through a logger scoped to this tick.
   */
  tick() {
    this.ticks += 1;
    const tickLogger = this.logger.withOperation('heartbeat').with('tick', this.ticks);

    try {
      const memory = process.memoryUsage();
      tickLogger.debug(
        'heartbeat',
        tickLogger.anyAttr('uptime_ms', Date.now() - this.startedAt),
        tickLogger.anyAttr('rss_bytes', memory.rss),
        tickLogger.anyAttr('heap_used_bytes', memory.heapUsed),
      );
    } catch (error) {
      tickLogger.error('heartbeat failed', error instanceof Error ? error : new Error(String(error)));
    }
  }

  private async run() {
    while (this.isRunning) {
      this.tick();
      await this.sleep(this.config.heartbeatIntervalMs);
    }
  }

  private sleep(ms: number) {
    return new Promise<void>((resolve) => setTimeout(resolve, ms));
  }
}
