import { Injectable } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bull';
import { STAIRCASE_BACKOFF } from '../../messaging/utils/backoff.utils';
import {
  PROCESS_WEBHOOK_JOB,
  WEBHOOK_JOB_ATTEMPTS,
  WEBHOOK_QUEUE,
} from '../../queue/queue.constants';
import { assertQueueReady } from '../../queue/queue.types';
import type { JobQueue } from '../../queue/queue.types';
import type {
  WebhookJobData,
  WebhookPayload,
} from '../types/webhook-payload.type';
import { toWebhookJobData } from '../utils/webhook-payload.utils';
import type { WebhookSubmitter } from './webhook-submitter.interface';

@Injectable()
export class BullWebhookSubmitter implements WebhookSubmitter {
  readonly mode = 'queued';

  constructor(
    @InjectQueue(WEBHOOK_QUEUE)
    private readonly queue: JobQueue<WebhookJobData>,
  ) {}

  /** Un rechazo garantiza que el job no quedó encolado. */
  async submit(payload: WebhookPayload): Promise<void> {
    assertQueueReady(this.queue, 'Webhook');

    await this.queue.add(PROCESS_WEBHOOK_JOB, toWebhookJobData(payload), {
      attempts: WEBHOOK_JOB_ATTEMPTS,
      backoff: { type: STAIRCASE_BACKOFF },
      removeOnComplete: true,
    });
  }
}
