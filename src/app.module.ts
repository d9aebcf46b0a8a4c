import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { BullModule } from '@nestjs/bull';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { EvolutionConfigModule } from './config/evolution-config.module';
import { loadEvolutionConfig } from './config/evolution.config';
import type { EvolutionConfig } from './config/evolution.config';
import { postgresOptions } from './database/database.options';
import { EvolutionApiModule } from './evolution-api/evolution-api.module';
import { MessagingModule } from './messaging/messaging.module';
import { bullRootOptions } from './queue/queue.options';
import { StorageModule } from './storage/storage.module';
import { webhookRouter, WebhookModule } from './webhook/webhook.module';

@Module({})
export class AppModule {
  static forRoot(config: EvolutionConfig = loadEvolutionConfig()): DynamicModule {
    // Redis sólo hace falta si alguna de las dos colas está activa
    const usesRedis = config.queue.enabled || config.webhook.queue;

    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({ isGlobal: true }),
        EvolutionConfigModule.forRoot(config),
        EventEmitterModule.forRoot({ wildcard: false }),
        TypeOrmModule.forRootAsync({
          imports: [ConfigModule],
          inject: [ConfigService],
          useFactory: (configService: ConfigService) =>
            postgresOptions((key) => configService.get<string>(key)),
        }),
        ...(usesRedis ? [BullModule.forRoot(bullRootOptions(config))] : []),
        StorageModule,
        EvolutionApiModule,
        MessagingModule.forRoot(config),
        WebhookModule.forRoot({ config }),
        webhookRouter(config),
      ],
    };
  }
}
