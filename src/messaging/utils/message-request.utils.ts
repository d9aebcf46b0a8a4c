import { ConfigurationError } from '../../common/errors';
import { isRecord } from '../../common/record.utils';
import { isMessageType, MessageJobSpec, MessageType } from '../types/message-job.type';

const REQUIRED_FIELDS: Record<MessageType, string[]> = {
  text: ['number', 'text'],
  media: ['number', 'mediatype', 'media'],
  audio: ['number', 'audio'],
  location: ['number', 'latitude', 'longitude'],
};

function isPresent(value: unknown): boolean {
  if (typeof value === 'string') {
    return value.trim().length > 0;
  }

  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Valida el tipo, los campos obligatorios y, si se indican las conexiones
 * configuradas, la conexión nombrada. Lanza ConfigurationError (no
 * reintentable) antes de cualquier llamada de red.
 */
export function assertSendable(
  spec: MessageJobSpec,
  connections?: Readonly<Record<string, unknown>>,
): void {
  const type: unknown = spec.messageType;

  if (!isMessageType(type)) {
    throw new ConfigurationError(`Unknown message type: ${String(type)}`);
  }

  if (!spec.instanceName) {
    throw new ConfigurationError('Missing instance name');
  }

  const missing = REQUIRED_FIELDS[type].filter(
    (field) => !isPresent(spec.message[field]),
  );

  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing ${type} message fields: ${missing.join(', ')}`,
    );
  }

  const { connectionName } = spec;

  // null usa la conexión por defecto, que siempre existe
  if (
    connections &&
    connectionName !== null &&
    !Object.keys(connections).includes(connectionName)
  ) {
    throw new ConfigurationError(
      `Unknown Evolution API connection: ${connectionName}`,
    );
  }
}

/**
 * Reconstruye un MessageJobSpec desde datos no tipados (payload de Bull o
 * registro persistido).
 */
export function toMessageJobSpec(data: unknown): MessageJobSpec {
  if (!isRecord(data) || !isRecord(data.message)) {
    throw new ConfigurationError('Malformed message job data');
  }

  const { instanceName, messageType, connectionName, failedMessageId } = data;

  if (typeof instanceName !== 'string' || !isMessageType(messageType)) {
    throw new ConfigurationError(
      `Unknown message type: ${String(messageType)}`,
    );
  }

  return {
    instanceName,
    messageType,
    message: data.message,
    connectionName: typeof connectionName === 'string' ? connectionName : null,
    ...(typeof failedMessageId === 'string' ? { failedMessageId } : {}),
  };
}

export function recipientOf(spec: MessageJobSpec): string | null {
  const number = spec.message.number;
  return typeof number === 'string' ? number : null;
}

export function textMessage(
  instanceName: string,
  number: string,
  text: string,
  options: Record<string, unknown> = {},
  connectionName: string | null = null,
): MessageJobSpec {
  return {
    instanceName,
    messageType: 'text',
    message: { ...options, number, text },
    connectionName,
  };
}

export function mediaMessage(
  instanceName: string,
  number: string,
  mediatype: 'image' | 'video' | 'document' | 'audio',
  media: string,
  options: Record<string, unknown> = {},
  connectionName: string | null = null,
): MessageJobSpec {
  return {
    instanceName,
    messageType: 'media',
    message: { ...options, number, mediatype, media },
    connectionName,
  };
}
