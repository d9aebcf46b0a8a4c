export interface EvolutionConnectionConfig {
  serverUrl: string;
  apiKey: string | null;
}

export interface RedisConnectionConfig {
  host: string;
  port: number;
  password?: string;
}

export interface EvolutionConfig {
  connections: Record<string, EvolutionConnectionConfig>;
  defaultInstance: string | null;
  http: {
    timeoutMs: number;
    messageTimeoutMs: number;
  };
  webhook: {
    verifySignature: boolean;
    secret: string | null;
    queue: boolean;
    queueName: string;
    path: string;
    /** Límite del cuerpo JSON (formato de body-parser: `10mb`, `512kb`). */
    maxBodySize: string;
  };
  queue: {
    enabled: boolean;
    queue: string;
    connection: string | null;
    redis: RedisConnectionConfig;
    backoff: number[];
    maxExceptions: number;
  };
  rateLimit: {
    enabled: boolean;
    /** Envíos permitidos por ventana, por cola. */
    maxMessages: number;
    windowMs: number;
  };
  database: {
    storeMessages: boolean;
    storeWebhooks: boolean;
    pruneAfterDays: number;
  };
}

export const EVOLUTION_CONFIG = Symbol('EVOLUTION_CONFIG');

export const DEFAULT_CONNECTION = 'default';
export const DEFAULT_SERVER_URL = 'http://localhost:8080';
export const DEFAULT_WEBHOOK_PATH = 'api/evolution-api/webhook';
export const DEFAULT_MAX_BODY_SIZE = '10mb';
export const DEFAULT_BACKOFF_SECONDS = [60, 300, 900];

type Env = Record<string, string | undefined>;

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

function readString(env: Env, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const value = env[key]?.trim().toLowerCase();

  if (value && TRUE_VALUES.includes(value)) {
    return true;
  }

  if (value && FALSE_VALUES.includes(value)) {
    return false;
  }

  return fallback;
}

function readInteger(env: Env, key: string, fallback: number): number {
  const value = readString(env, key);

  if (value === null || !/^\d+$/.test(value)) {
    return fallback;
  }

  return parseInt(value, 10);
}

function readBackoff(env: Env): number[] {
  const value = readString(env, 'EVOLUTION_QUEUE_BACKOFF');

  if (value === null) {
    return [...DEFAULT_BACKOFF_SECONDS];
  }

  const steps = value
    .split(',')
    .map((step) => step.trim())
    .filter((step) => /^\d+$/.test(step))
    .map((step) => parseInt(step, 10));

  return steps.length > 0 ? steps : [...DEFAULT_BACKOFF_SECONDS];
}

function readBodySize(env: Env): string {
  const value = readString(env, 'EVOLUTION_WEBHOOK_MAX_BODY')?.toLowerCase();
  return value && /^\d+(b|kb|mb)?$/.test(value) ? value : DEFAULT_MAX_BODY_SIZE;
}

function normalizePath(path: string | null): string {
  const trimmed = (path ?? '').replace(/^\/+|\/+$/g, '');
  return trimmed.length > 0 ? trimmed : DEFAULT_WEBHOOK_PATH;
}

// Conexiones extra: EVOLUTION_CONNECTION_<NOMBRE>_URL / EVOLUTION_CONNECTION_<NOMBRE>_KEY
function readConnections(
  env: Env,
): Record<string, EvolutionConnectionConfig> {
  const connections: Record<string, EvolutionConnectionConfig> = {
    [DEFAULT_CONNECTION]: {
      serverUrl: readString(env, 'EVOLUTION_API_URL') ?? DEFAULT_SERVER_URL,
      apiKey: readString(env, 'EVOLUTION_API_KEY'),
    },
  };

  for (const key of Object.keys(env)) {
    const match = /^EVOLUTION_CONNECTION_([A-Z0-9_]+)_URL$/.exec(key);
    const serverUrl = readString(env, key);

    if (!match || serverUrl === null) {
      continue;
    }

    connections[match[1].toLowerCase()] = {
      serverUrl,
      apiKey: readString(env, `EVOLUTION_CONNECTION_${match[1]}_KEY`),
    };
  }

  return connections;
}

/**
 * Lee la configuración una sola vez al arrancar. Los componentes reciben el
 * objeto resultante por inyección (EVOLUTION_CONFIG), nunca leen `process.env`.
 */
export function loadEvolutionConfig(env: Env = process.env): EvolutionConfig {
  const redisPassword = readString(env, 'REDIS_PASSWORD');

  return {
    connections: readConnections(env),
    defaultInstance: readString(env, 'EVOLUTION_DEFAULT_INSTANCE'),
    http: {
      timeoutMs: readInteger(env, 'EVOLUTION_HTTP_TIMEOUT', 30) * 1000,
      messageTimeoutMs:
        readInteger(env, 'EVOLUTION_HTTP_MESSAGE_TIMEOUT', 60) * 1000,
    },
    webhook: {
      verifySignature: readBoolean(env, 'EVOLUTION_VERIFY_WEBHOOK', true),
      secret: readString(env, 'EVOLUTION_WEBHOOK_SECRET'),
      queue: readBoolean(env, 'EVOLUTION_WEBHOOK_QUEUE', false),
      queueName: readString(env, 'EVOLUTION_WEBHOOK_QUEUE_NAME') ?? 'default',
      path: normalizePath(readString(env, 'EVOLUTION_WEBHOOK_PATH')),
      maxBodySize: readBodySize(env),
    },
    queue: {
      enabled: readBoolean(env, 'EVOLUTION_QUEUE_ENABLED', true),
      queue: readString(env, 'EVOLUTION_QUEUE_NAME') ?? 'evolution-api',
      connection: readString(env, 'EVOLUTION_QUEUE_CONNECTION'),
      redis: {
        host: readString(env, 'REDIS_HOST') ?? 'localhost',
        port: readInteger(env, 'REDIS_PORT', 6379),
        ...(redisPassword !== null ? { password: redisPassword } : {}),
      },
      backoff: readBackoff(env),
      maxExceptions: Math.max(
        1,
        readInteger(env, 'EVOLUTION_QUEUE_MAX_EXCEPTIONS', 3),
      ),
    },
    rateLimit: {
      enabled: readBoolean(env, 'EVOLUTION_RATE_LIMIT_ENABLED', true),
      maxMessages: Math.max(
        1,
        readInteger(env, 'EVOLUTION_RATE_LIMIT_MESSAGES', 30),
      ),
      windowMs:
        Math.max(1, readInteger(env, 'EVOLUTION_RATE_LIMIT_DECAY', 60)) * 1000,
    },
    database: {
      storeMessages: readBoolean(env, 'EVOLUTION_STORE_MESSAGES', true),
      storeWebhooks: readBoolean(env, 'EVOLUTION_STORE_WEBHOOKS', true),
      pruneAfterDays: readInteger(env, 'EVOLUTION_PRUNE_DAYS', 30),
    },
  };
}
