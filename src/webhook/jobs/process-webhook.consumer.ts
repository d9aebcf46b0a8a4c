import { Logger } from '@nestjs/common';
import { Process, Processor } from '@nestjs/bull';
import type { Job } from 'bull';
import { PROCESS_WEBHOOK_JOB, WEBHOOK_QUEUE } from '../../queue/queue.constants';
import { WebhookProcessorService } from '../webhook-processor.service';
import type { WebhookJobData } from '../types/webhook-payload.type';
import { fromWebhookJobData } from '../utils/webhook-payload.utils';

@Processor(WEBHOOK_QUEUE)
export class ProcessWebhookConsumer {
  private readonly logger = new Logger(ProcessWebhookConsumer.name);

  constructor(private readonly processor: WebhookProcessorService) {}

  @Process(PROCESS_WEBHOOK_JOB)
  async handle(job: Job<WebhookJobData>): Promise<void> {
    this.logger.debug(
      `Procesando webhook encolado ${job.data.event} (intento ${job.attemptsMade + 1})`,
    );
    await this.processor.process(fromWebhookJobData(job.data));
  }
}
