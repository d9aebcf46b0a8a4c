import { Inject, Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../common/record.utils';
import { parseWebhookPayload } from './utils/webhook-payload.utils';
import {
  INLINE_WEBHOOK_SUBMITTER,
  WEBHOOK_SUBMITTER,
} from './submitters/webhook-submitter.interface';
import type { WebhookSubmitter } from './submitters/webhook-submitter.interface';

export interface WebhookDispatchResult {
  status: 'success';
  message: 'Webhook queued' | 'Webhook processed';
}

@Injectable()
export class WebhookDispatcherService {
  private readonly logger = new Logger(WebhookDispatcherService.name);

  constructor(
    @Inject(WEBHOOK_SUBMITTER)
    private readonly submitter: WebhookSubmitter,
    @Inject(INLINE_WEBHOOK_SUBMITTER)
    private readonly inlineSubmitter: WebhookSubmitter,
  ) {}

  /**
   * Valida, normaliza y despacha el webhook. Un payload inválido lanza
   * InvalidWebhookPayloadError antes de cualquier efecto.
   */
  async dispatch(
    raw: unknown,
    instanceHint: string | null = null,
  ): Promise<WebhookDispatchResult> {
    const payload = parseWebhookPayload(raw, instanceHint);

    this.logger.log(
      `📩 Webhook recibido: ${payload.event} (${payload.instanceName ?? 'sin instancia'})`,
    );

    if (this.submitter.mode === 'queued') {
      try {
        await this.submitter.submit(payload);
        return { status: 'success', message: 'Webhook queued' };
      } catch (error: unknown) {
        this.logger.warn(
          `⚠️ No se pudo encolar ${payload.event}, se procesa en línea: ${errorMessage(error)}`,
        );
      }
    }

    await this.inlineSubmitter.submit(payload);
    return { status: 'success', message: 'Webhook processed' };
  }
}
