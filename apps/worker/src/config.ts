import { z } from 'zod';
import { parseOrThrow } from '@logfacade/logging';

export const WORKER_CONFIG = Symbol('WORKER_CONFIG');

export const DEFAULT_HEARTBEAT_INTERVAL_MS = 5000;

const workerEnvSchema = z.object({
  HEARTBEAT_INTERVAL_MS: z.coerce.number().int().positive().default(DEFAULT_HEARTBEAT_INTERVAL_MS),
});

export interface WorkerConfig {
  heartbeatIntervalMs: number;
}

export function loadWorkerConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  const parsed = parseOrThrow(workerEnvSchema, env, {
    message: 'Invalid worker configuration',
  });
  return { heartbeatIntervalMs: parsed.HEARTBEAT_INTERVAL_MS };
}
