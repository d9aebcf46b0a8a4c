import { loadEvolutionConfig } from './evolution.config';

describe('loadEvolutionConfig', () => {
  it('aplica los valores por defecto con un entorno vacío', () => {
    const config = loadEvolutionConfig({});

    expect(config.connections).toEqual({
      default: { serverUrl: 'http://localhost:8080', apiKey: null },
    });
    expect(config.webhook).toEqual({
      verifySignature: true,
      secret: null,
      queue: false,
      queueName: 'default',
      path: 'api/evolution-api/webhook',
      maxBodySize: '10mb',
    });
    expect(config.rateLimit).toEqual({
      enabled: true,
      maxMessages: 30,
      windowMs: 60000,
    });
    expect(config.queue.backoff).toEqual([60, 300, 900]);
    expect(config.queue.maxExceptions).toBe(3);
    expect(config.queue.queue).toBe('evolution-api');
    expect(config.http).toEqual({ timeoutMs: 30000, messageTimeoutMs: 60000 });
    expect(config.database).toEqual({
      storeMessages: true,
      storeWebhooks: true,
      pruneAfterDays: 30,
    });
  });

  it('lee las variables de entorno', () => {
    const config = loadEvolutionConfig({
      EVOLUTION_API_URL: 'https://evo.test',
      EVOLUTION_API_KEY: 'test-key',
      EVOLUTION_VERIFY_WEBHOOK: 'off',
      EVOLUTION_WEBHOOK_SECRET: 'test-secret',
      EVOLUTION_WEBHOOK_QUEUE: 'YES',
      EVOLUTION_WEBHOOK_PATH: '/hooks/evolution/',
      EVOLUTION_QUEUE_BACKOFF: '5, 10,x',
      EVOLUTION_QUEUE_MAX_EXCEPTIONS: '5',
      EVOLUTION_CONNECTION_BACKUP_URL: 'https://backup.test',
      EVOLUTION_CONNECTION_BACKUP_KEY: 'backup-key',
      REDIS_PASSWORD: 'redis-pass',
    });

    expect(config.connections.default).toEqual({
      serverUrl: 'https://evo.test',
      apiKey: 'test-key',
    });
    expect(config.connections.backup).toEqual({
      serverUrl: 'https://backup.test',
      apiKey: 'backup-key',
    });
    expect(config.webhook.verifySignature).toBe(false);
    expect(config.webhook.secret).toBe('test-secret');
    expect(config.webhook.queue).toBe(true);
    expect(config.webhook.path).toBe('hooks/evolution');
    expect(config.queue.backoff).toEqual([5, 10]);
    expect(config.queue.maxExceptions).toBe(5);
    expect(config.queue.redis).toEqual({
      host: 'localhost',
      port: 6379,
      password: 'redis-pass',
    });
  });

  it('ignora valores inválidos', () => {
    const config = loadEvolutionConfig({
      EVOLUTION_VERIFY_WEBHOOK: 'quizás',
      EVOLUTION_PRUNE_DAYS: 'diez',
      EVOLUTION_QUEUE_BACKOFF: 'a,b',
      EVOLUTION_WEBHOOK_PATH: '///',
    });

    expect(config.webhook.verifySignature).toBe(true);
    expect(config.database.pruneAfterDays).toBe(30);
    expect(config.queue.backoff).toEqual([60, 300, 900]);
    expect(config.webhook.path).toBe('api/evolution-api/webhook');
  });

  it('lee el límite de cuerpo y el rate limit de salida', () => {
    const config = loadEvolutionConfig({
      EVOLUTION_WEBHOOK_MAX_BODY: '25MB',
      EVOLUTION_RATE_LIMIT_ENABLED: 'off',
      EVOLUTION_RATE_LIMIT_MESSAGES: '12',
      EVOLUTION_RATE_LIMIT_DECAY: '30',
    });

    expect(config.webhook.maxBodySize).toBe('25mb');
    expect(config.rateLimit).toEqual({
      enabled: false,
      maxMessages: 12,
      windowMs: 30000,
    });
  });

  it('vuelve al límite por defecto con un tamaño ilegible', () => {
    const config = loadEvolutionConfig({ EVOLUTION_WEBHOOK_MAX_BODY: 'mucho' });

    expect(config.webhook.maxBodySize).toBe('10mb');
  });
});
