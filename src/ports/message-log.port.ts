import type { MessageType } from '../messaging/types/message-job.type';

/**
 * Puerto de salida: historial de mensajes salientes.
 */
export interface MessageLogPort {
  save(entry: MessageLogEntry): Promise<void>;
  countOlderThan(date: Date): Promise<number>;
  deleteOlderThan(date: Date): Promise<number>;
}

export interface MessageLogEntry {
  messageId: string | null;
  instanceName: string;
  remoteJid: string | null;
  messageType: MessageType;
  status: 'sent' | 'failed';
  payload: Record<string, unknown>;
  response: unknown;
  errorMessage: string | null;
}

export const MESSAGE_LOG_PORT = Symbol('MESSAGE_LOG_PORT');
