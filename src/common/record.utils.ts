import { isAxiosError } from 'axios';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Acceso por ruta con puntos (`data.key.remoteJid`) sobre JSON no confiable.
 */
export function getPath(source: unknown, path: string): unknown {
  let current: unknown = source;

  for (const segment of path.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[segment];
  }

  return current;
}

/** Primer valor string no vacío entre varias rutas. */
export function firstString(
  source: unknown,
  paths: string[],
): string | null {
  for (const path of paths) {
    const value = getPath(source, path);

    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }

  return null;
}

export function errorMessage(error: unknown): string {
  if (isAxiosError(error)) {
    const responseData: unknown = error.response?.data;
    const apiMessage = getPath(responseData, 'response.message');

    if (typeof apiMessage === 'string' && apiMessage.length > 0) {
      return apiMessage;
    }

    if (error.message.length > 0) {
      return error.message;
    }
  }

  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'Unknown error';
}
