import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  FAILED_MESSAGE_PORT,
  MESSAGE_LOG_PORT,
  WEBHOOK_LOG_PORT,
} from '../../ports';
import type {
  FailedMessagePort,
  MessageLogPort,
  WebhookLogPort,
} from '../../ports';

export interface PruneOptions {
  days: number;
  messages: boolean;
  webhooks: boolean;
  dryRun: boolean;
}

export interface PruneReport {
  cutoff: Date;
  dryRun: boolean;
  counts: {
    messages: number;
    failedMessages: number;
    webhookLogs: number;
  };
  total: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

interface PrunableStore {
  countOlderThan(date: Date): Promise<number>;
  deleteOlderThan(date: Date): Promise<number>;
}

/**
 * Borra historial de mensajes, mensajes fallidos y logs de webhooks más
 * viejos que N días. Sin selector se limpian ambos grupos.
 */
@Injectable()
export class PruneService {
  private readonly logger = new Logger(PruneService.name);

  constructor(
    @Inject(MESSAGE_LOG_PORT)
    private readonly messageLog: MessageLogPort,
    @Inject(FAILED_MESSAGE_PORT)
    private readonly failedMessages: FailedMessagePort,
    @Inject(WEBHOOK_LOG_PORT)
    private readonly webhookLog: WebhookLogPort,
  ) {}

  async prune(options: PruneOptions, now = new Date()): Promise<PruneReport> {
    const cutoff = new Date(now.getTime() - options.days * DAY_MS);
    const both = !options.messages && !options.webhooks;
    const pruneMessages = both || options.messages;
    const pruneWebhooks = both || options.webhooks;

    const run = (store: PrunableStore, enabled: boolean): Promise<number> => {
      if (!enabled) {
        return Promise.resolve(0);
      }
      return options.dryRun
        ? store.countOlderThan(cutoff)
        : store.deleteOlderThan(cutoff);
    };

    const counts = {
      messages: await run(this.messageLog, pruneMessages),
      failedMessages: await run(this.failedMessages, pruneMessages),
      webhookLogs: await run(this.webhookLog, pruneWebhooks),
    };
    const total = counts.messages + counts.failedMessages + counts.webhookLogs;

    if (!options.dryRun) {
      this.logger.log(
        `🧹 ${total} registros anteriores a ${cutoff.toISOString()} eliminados`,
      );
    }

    return { cutoff, dryRun: options.dryRun, counts, total };
  }
}
