import type { BullModuleOptions, BullRootModuleOptions } from '@nestjs/bull';
import type { EvolutionConfig } from '../config/evolution.config';
import {
  backoffDelayMs,
  STAIRCASE_BACKOFF,
} from '../messaging/utils/backoff.utils';
import { WEBHOOK_JOB_BACKOFF_SECONDS } from './queue.constants';

export function bullRootOptions(config: EvolutionConfig): BullRootModuleOptions {
  return config.queue.connection
    ? { url: config.queue.connection }
    : { redis: config.queue.redis };
}

// Cada cola registra su propia tabla de espera bajo la estrategia `staircase`
function staircaseSettings(backoffSeconds: readonly number[]) {
  return {
    backoffStrategies: {
      [STAIRCASE_BACKOFF]: (attemptsMade: number) =>
        backoffDelayMs(backoffSeconds, attemptsMade),
    },
  };
}

export function webhookQueueOptions(config: EvolutionConfig): BullModuleOptions {
  return {
    name: config.webhook.queueName,
    settings: staircaseSettings(WEBHOOK_JOB_BACKOFF_SECONDS),
  };
}

// El limitador de Bull es global a la cola: cubre a todos los workers que la consumen
export function messageQueueOptions(config: EvolutionConfig): BullModuleOptions {
  const { rateLimit } = config;

  return {
    name: config.queue.queue,
    settings: staircaseSettings(config.queue.backoff),
    ...(rateLimit.enabled
      ? { limiter: { max: rateLimit.maxMessages, duration: rateLimit.windowMs } }
      : {}),
  };
}
