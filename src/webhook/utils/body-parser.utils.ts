import type { NestExpressApplication } from '@nestjs/platform-express';
import type { EvolutionConfig } from '../../config/evolution.config';

/**
 * Los webhooks con media en base64 superan el límite de 100kb de Express.
 * Debe llamarse antes de `init()`; el cuerpo crudo sigue disponible si la
 * app se creó con `rawBody: true`.
 */
export function configureWebhookBodyParser(
  app: NestExpressApplication,
  config: EvolutionConfig,
): void {
  app.useBodyParser('json', { limit: config.webhook.maxBodySize });
}
