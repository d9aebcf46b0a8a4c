import * as crypto from 'crypto';

export const SIGNATURE_HEADERS = [
  'x-webhook-signature',
  'x-evolution-signature',
  'x-signature',
] as const;

export type SignatureHeaders = Record<string, string | string[] | undefined>;

export interface SignatureContext {
  rawBody: Buffer;
  headers: SignatureHeaders;
  secret: string | null;
  verificationEnabled: boolean;
}

export type SignatureVerdict =
  | { allowed: true }
  | { allowed: false; reason: string };

function headerValue(headers: SignatureHeaders, name: string): string | null {
  const key = Object.keys(headers).find((header) => header.toLowerCase() === name);
  const value = key === undefined ? undefined : headers[key];

  if (value === undefined) {
    return null;
  }

  return Array.isArray(value) ? (value[0] ?? '') : value;
}

/**
 * Sólo cuenta el primer header presente según la prioridad; los de menor
 * prioridad se ignoran aunque validen.
 */
export function pickSignature(headers: SignatureHeaders): string | null {
  for (const name of SIGNATURE_HEADERS) {
    const value = headerValue(headers, name);

    if (value !== null) {
      return value;
    }
  }

  return null;
}

export function computeSignature(secret: string, rawBody: Buffer): string {
  return crypto.createHmac('sha256', secret).update(rawBody).digest('hex');
}

export function verifyWebhookSignature(
  context: SignatureContext,
): SignatureVerdict {
  if (!context.verificationEnabled || !context.secret) {
    return { allowed: true };
  }

  const signature = pickSignature(context.headers);

  if (!signature) {
    return { allowed: false, reason: 'Missing signature header' };
  }

  const expected = Buffer.from(
    computeSignature(context.secret, context.rawBody),
    'utf8',
  );
  const received = Buffer.from(signature, 'utf8');

  // Comparación en tiempo constante (timing attacks)
  if (
    expected.length !== received.length ||
    !crypto.timingSafeEqual(expected, received)
  ) {
    return { allowed: false, reason: 'Invalid signature' };
  }

  return { allowed: true };
}
