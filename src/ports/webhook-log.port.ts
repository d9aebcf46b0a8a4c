/**
 * Puerto de salida: registro de webhooks recibidos.
 */
export interface WebhookLogPort {
  save(entry: WebhookLogEntry): Promise<void>;
  countOlderThan(date: Date): Promise<number>;
  deleteOlderThan(date: Date): Promise<number>;
}

export interface WebhookLogEntry {
  instanceName: string | null;
  event: string;
  payload: Record<string, unknown>;
  status: 'processed' | 'failed';
  errorMessage: string | null;
  processingTimeMs: number;
}

export const WEBHOOK_LOG_PORT = Symbol('WEBHOOK_LOG_PORT');
