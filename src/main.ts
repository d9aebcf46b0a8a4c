import 'reflect-metadata';
import 'dotenv/config';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { loadEvolutionConfig } from './config/evolution.config';
import { configureWebhookBodyParser } from './webhook/utils/body-parser.utils';

async function bootstrap() {
  const config = loadEvolutionConfig();
  const app = await NestFactory.create<NestExpressApplication>(
    AppModule.forRoot(config),
    {
      rawBody: true, // Importante para verificar firma de Webhooks
    },
  );
  configureWebhookBodyParser(app, config);
  app.enableShutdownHooks();
  await app.listen(process.env.PORT ?? 3000);
}
void bootstrap();
