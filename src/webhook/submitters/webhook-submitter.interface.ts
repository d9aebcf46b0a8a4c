import type { WebhookPayload } from '../types/webhook-payload.type';

export interface WebhookSubmitter {
  readonly mode: 'queued' | 'inline';
  submit(payload: WebhookPayload): Promise<void>;
}

/** Elegido por configuración (`webhook.queue`). */
export const WEBHOOK_SUBMITTER = Symbol('WEBHOOK_SUBMITTER');
/** Siempre disponible: respaldo cuando falla el encolado. */
export const INLINE_WEBHOOK_SUBMITTER = Symbol('INLINE_WEBHOOK_SUBMITTER');
