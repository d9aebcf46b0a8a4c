import { Injectable } from '@nestjs/common';
import { WebhookProcessorService } from '../webhook-processor.service';
import type { WebhookPayload } from '../types/webhook-payload.type';
import type { WebhookSubmitter } from './webhook-submitter.interface';

@Injectable()
export class InlineWebhookSubmitter implements WebhookSubmitter {
  readonly mode = 'inline';

  constructor(private readonly processor: WebhookProcessorService) {}

  submit(payload: WebhookPayload): Promise<void> {
    return this.processor.process(payload);
  }
}
