export interface WebhookPayload {
  /** Nombre tal cual llegó (`messages.upsert`, `MESSAGES_UPSERT`...). */
  event: string;
  instanceName: string | null;
  /** Payload original sin `event`, `instance` ni `instanceName`. */
  data: Record<string, unknown>;
  receivedAt: Date;
}

/** Forma serializable que viaja por la cola de webhooks. */
export interface WebhookJobData {
  event: string;
  instanceName: string | null;
  data: Record<string, unknown>;
  receivedAt: string;
}
