import type { ApiResponse } from '../ports';
import type { MessageJobSpec } from '../messaging/types/message-job.type';
import type { WebhookPayload } from '../webhook/types/webhook-payload.type';

export const EvolutionEvents = {
  WEBHOOK_RECEIVED: 'evolution.webhook.received',
  MESSAGE_RECEIVED: 'evolution.message.received',
  MESSAGE_DELIVERED: 'evolution.message.delivered',
  MESSAGE_READ: 'evolution.message.read',
  MESSAGE_ECHOED: 'evolution.message.echoed',
  MESSAGE_SENT: 'evolution.message.sent',
  MESSAGE_FAILED: 'evolution.message.failed',
  CONNECTION_UPDATED: 'evolution.connection.updated',
  QRCODE_RECEIVED: 'evolution.qrcode.received',
} as const;

export type ConnectionStatus =
  | 'open'
  | 'close'
  | 'connecting'
  | 'qrcode'
  | 'unknown';

export class WebhookReceivedEvent {
  constructor(readonly payload: WebhookPayload) {}
}

export class MessageReceivedEvent {
  constructor(
    readonly instanceName: string | null,
    readonly message: Record<string, unknown>,
    readonly sender: string | null,
    readonly messageType: string,
    readonly isGroup: boolean,
    readonly groupId: string | null,
  ) {}
}

export class MessageStatusEvent {
  constructor(
    readonly instanceName: string | null,
    readonly messageId: string | null,
    readonly remoteJid: string | null,
    readonly status: string | number,
  ) {}
}

export class MessageEchoedEvent {
  constructor(
    readonly instanceName: string | null,
    readonly messageType: string,
    readonly message: Record<string, unknown>,
  ) {}
}

export class ConnectionUpdatedEvent {
  constructor(
    readonly instanceName: string | null,
    readonly status: ConnectionStatus,
    readonly rawState: string | null,
    readonly data: Record<string, unknown>,
  ) {}
}

export class QrCodeReceivedEvent {
  constructor(
    readonly instanceName: string | null,
    readonly qrCode: string | null,
    readonly pairingCode: string | null,
    readonly attempt: number | null,
  ) {}
}

export class MessageSentEvent {
  constructor(
    readonly spec: MessageJobSpec,
    readonly response: ApiResponse,
  ) {}
}

export class MessageFailedEvent {
  constructor(
    readonly spec: MessageJobSpec,
    readonly error: string,
    readonly attempt: number,
    /** true una sola vez por job: cuando se agotan los intentos. */
    readonly terminal: boolean,
  ) {}
}
