export const MESSAGE_TYPES = ['text', 'media', 'audio', 'location'] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

export interface MessageJobSpec {
  instanceName: string;
  messageType: MessageType;
  message: Record<string, unknown>;
  connectionName: string | null;
  /** Presente cuando el job reintenta un registro de mensaje fallido. */
  failedMessageId?: string;
}

export type MessageJobState =
  | 'pending'
  | 'sending'
  | 'succeeded'
  | 'failed'
  | 'exhausted';

export function isMessageType(value: unknown): value is MessageType {
  return MESSAGE_TYPES.some((type) => type === value);
}
