import type { WebhookPayload } from '../types/webhook-payload.type';

/**
 * Handler de webhooks. `events` acepta cualquier grafía
 * (`messages.upsert`, `MESSAGES_UPSERT`) o `*` para todos.
 */
export interface WebhookHandler {
  readonly events: readonly string[];
  handle(payload: WebhookPayload): Promise<void> | void;
}

export const WEBHOOK_HANDLERS = Symbol('WEBHOOK_HANDLERS');
