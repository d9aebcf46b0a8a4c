import type { MessageType } from '../messaging/types/message-job.type';

/**
 * Puerto de salida: mensajes que agotaron (o están agotando) sus intentos.
 */
export interface FailedMessagePort {
  record(failure: NewFailedMessage): Promise<FailedMessageData>;
  registerRetryFailure(id: string, error: string): Promise<void>;
  delete(id: string): Promise<void>;
  findRetryable(filter: RetryableFilter): Promise<FailedMessageData[]>;
  countOlderThan(date: Date): Promise<number>;
  deleteOlderThan(date: Date): Promise<number>;
}

export interface NewFailedMessage {
  instanceName: string;
  recipient: string | null;
  messageType: MessageType;
  payload: Record<string, unknown>;
  connectionName: string | null;
  error: string;
}

export interface FailedMessageData {
  id: string;
  instanceName: string;
  recipient: string | null;
  messageType: MessageType;
  payload: Record<string, unknown>;
  connectionName: string | null;
  retryCount: number;
  lastError: string | null;
  createdAt: Date;
}

export interface RetryableFilter {
  maxRetries: number;
  limit: number;
  instanceName?: string;
}

export const FAILED_MESSAGE_PORT = Symbol('FAILED_MESSAGE_PORT');
