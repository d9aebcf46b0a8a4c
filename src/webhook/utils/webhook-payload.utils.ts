import { InvalidWebhookPayloadError } from '../../common/errors';
import { firstString, getPath, isRecord } from '../../common/record.utils';
import type { ConnectionStatus } from '../../events/evolution.events';
import type { WebhookJobData, WebhookPayload } from '../types/webhook-payload.type';

export const WEBHOOK_EVENTS = [
  'APPLICATION_STARTUP',
  'QRCODE_UPDATED',
  'MESSAGES_SET',
  'MESSAGES_UPSERT',
  'MESSAGES_UPDATE',
  'MESSAGES_DELETE',
  'SEND_MESSAGE',
  'CONTACTS_SET',
  'CONTACTS_UPSERT',
  'CONTACTS_UPDATE',
  'PRESENCE_UPDATE',
  'CHATS_SET',
  'CHATS_UPSERT',
  'CHATS_UPDATE',
  'CHATS_DELETE',
  'GROUPS_UPSERT',
  'GROUP_UPDATE',
  'GROUP_PARTICIPANTS_UPDATE',
  'CONNECTION_UPDATE',
  'LABELS_EDIT',
  'LABELS_ASSOCIATION',
  'CALL',
  'TYPEBOT_START',
  'TYPEBOT_CHANGE_STATUS',
] as const;

export type WebhookEventName = (typeof WEBHOOK_EVENTS)[number];

const EVENT_ALIASES: Record<string, WebhookEventName> = {
  GROUPS_UPDATE: 'GROUP_UPDATE',
};

const RESERVED_KEYS = ['event', 'instance', 'instanceName'];

/**
 * `messages.upsert` (v2) y `MESSAGES_UPSERT` (v1) resuelven al mismo nombre.
 */
export function normalizeEventName(event: string): string {
  if (event === '*') {
    return event;
  }

  const normalized = event.trim().replace(/[.-]/g, '_').toUpperCase();
  return EVENT_ALIASES[normalized] ?? normalized;
}

export function isKnownEvent(event: string): boolean {
  const normalized = normalizeEventName(event);
  return WEBHOOK_EVENTS.some((known) => known === normalized);
}

/**
 * Valida y normaliza el cuerpo del webhook. Si la URL trae la instancia y el
 * cuerpo no, se inyecta; lo que venga en el cuerpo siempre gana.
 */
export function parseWebhookPayload(
  raw: unknown,
  instanceHint: string | null = null,
  receivedAt: Date = new Date(),
): WebhookPayload {
  if (!isRecord(raw)) {
    throw new InvalidWebhookPayloadError();
  }

  const event = raw.event;

  if (typeof event !== 'string' || event.trim().length === 0) {
    throw new InvalidWebhookPayloadError();
  }

  const data: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(raw)) {
    if (!RESERVED_KEYS.includes(key)) {
      data[key] = value;
    }
  }

  return {
    event,
    instanceName:
      firstString(raw, ['instance', 'instanceName']) ?? instanceHint,
    data,
    receivedAt,
  };
}

export function toWebhookJobData(payload: WebhookPayload): WebhookJobData {
  return {
    event: payload.event,
    instanceName: payload.instanceName,
    data: payload.data,
    receivedAt: payload.receivedAt.toISOString(),
  };
}

export function fromWebhookJobData(job: WebhookJobData): WebhookPayload {
  return {
    event: job.event,
    instanceName: job.instanceName,
    data: job.data,
    receivedAt: new Date(job.receivedAt),
  };
}

// --- Accesores sobre `data` (Evolution anida casi todo dentro de `data`) ---

export function getMessageData(
  payload: WebhookPayload,
): Record<string, unknown> {
  const nested = payload.data.data;

  if (isRecord(nested)) {
    return nested;
  }

  const message = payload.data.message;
  return isRecord(message) ? message : {};
}

export function getRemoteJid(payload: WebhookPayload): string | null {
  return firstString(payload.data, [
    'data.key.remoteJid',
    'data.remoteJid',
    'key.remoteJid',
    'remoteJid',
  ]);
}

export function getMessageId(payload: WebhookPayload): string | null {
  return firstString(payload.data, ['data.key.id', 'key.id', 'messageId']);
}

export function isFromGroup(payload: WebhookPayload): boolean {
  return getRemoteJid(payload)?.includes('@g.us') ?? false;
}

export function getConnectionState(payload: WebhookPayload): string | null {
  return firstString(payload.data, ['data.state', 'state', 'status']);
}

export function getQrCode(payload: WebhookPayload): string | null {
  return firstString(payload.data, [
    'data.qrcode.base64',
    'qrcode.base64',
    'qrcode',
    'base64',
  ]);
}

export function getPairingCode(payload: WebhookPayload): string | null {
  return firstString(payload.data, [
    'data.qrcode.pairingCode',
    'qrcode.pairingCode',
    'pairingCode',
  ]);
}

export function toConnectionStatus(state: string | null): ConnectionStatus {
  switch (state?.toLowerCase()) {
    case 'open':
    case 'connected':
      return 'open';
    case 'close':
    case 'closed':
    case 'disconnected':
      return 'close';
    case 'connecting':
      return 'connecting';
    case 'qrcode':
    case 'qr':
      return 'qrcode';
    default:
      return 'unknown';
  }
}

const MESSAGE_TYPE_KEYS: [string, string][] = [
  ['conversation', 'text'],
  ['extendedTextMessage', 'text'],
  ['imageMessage', 'image'],
  ['videoMessage', 'video'],
  ['audioMessage', 'audio'],
  ['documentMessage', 'document'],
  ['stickerMessage', 'sticker'],
  ['locationMessage', 'location'],
  ['contactMessage', 'contact'],
  ['reactionMessage', 'reaction'],
  ['pollCreationMessage', 'poll'],
  ['listMessage', 'list'],
  ['buttonsMessage', 'buttons'],
  ['templateMessage', 'template'],
];

export function detectMessageType(message: Record<string, unknown>): string {
  const content = getPath(message, 'message');

  if (!isRecord(content)) {
    return 'unknown';
  }

  const match = MESSAGE_TYPE_KEYS.find(([key]) => key in content);
  return match ? match[1] : 'unknown';
}
