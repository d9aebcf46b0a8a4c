import { firstString, getPath, isRecord } from '../../common/record.utils';
import type { ApiResponse } from '../../ports';

const SENSITIVE_KEYS = ['apikey', 'api_key', 'token', 'password', 'secret'];

function isTruthyError(value: unknown): boolean {
  return value !== undefined && value !== null && value !== false && value !== '';
}

function joinMessage(value: unknown): string | null {
  if (typeof value === 'string' && value.length > 0) {
    return value;
  }

  if (Array.isArray(value)) {
    const parts = value.filter(
      (part): part is string => typeof part === 'string' && part.length > 0,
    );
    return parts.length > 0 ? parts.join('; ') : null;
  }

  return null;
}

/**
 * Evolution devuelve errores como `{ status, error, response: { message: [...] } }`,
 * a veces con HTTP 2xx: un campo `error` también cuenta como fallo.
 */
export function toApiResponse(
  statusCode: number,
  statusText: string,
  data: unknown,
): ApiResponse {
  const success =
    statusCode >= 200 &&
    statusCode < 300 &&
    !(isRecord(data) && isTruthyError(data.error));

  const message =
    joinMessage(getPath(data, 'message')) ??
    joinMessage(getPath(data, 'response.message')) ??
    joinMessage(getPath(data, 'error')) ??
    (success ? null : statusText || `HTTP ${statusCode}`);

  return { success, statusCode, data, message };
}

/** Copia con las claves sensibles enmascaradas, para logs. */
export function redactSensitive(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactSensitive(item));
  }

  if (!isRecord(value)) {
    return value;
  }

  const redacted: Record<string, unknown> = {};

  for (const [key, entry] of Object.entries(value)) {
    redacted[key] = SENSITIVE_KEYS.includes(key.toLowerCase())
      ? '[REDACTED]'
      : redactSensitive(entry);
  }

  return redacted;
}

export interface InstanceSummary {
  name: string;
  status: string;
  owner: string | null;
  profileName: string | null;
  profilePictureUrl: string | null;
}

/**
 * Acepta la forma v1 (`{ instance: { instanceName, status, owner } }`) y la
 * v2 plana (`{ name, connectionStatus, ownerJid }`).
 */
export function toInstanceSummary(item: unknown): InstanceSummary | null {
  const source = isRecord(item) && isRecord(item.instance) ? item.instance : item;
  const name = firstString(source, ['instanceName', 'name']);

  if (name === null) {
    return null;
  }

  return {
    name,
    status: firstString(source, ['connectionStatus', 'status', 'state']) ?? 'unknown',
    owner: firstString(source, ['ownerJid', 'owner', 'number']),
    profileName: firstString(source, ['profileName']),
    profilePictureUrl: firstString(source, ['profilePicUrl', 'profilePictureUrl']),
  };
}

export function toInstanceSummaries(data: unknown): InstanceSummary[] {
  const items = Array.isArray(data) ? data : [];

  return items
    .map((item) => toInstanceSummary(item))
    .filter((summary): summary is InstanceSummary => summary !== null);
}
