import { DynamicModule, Module, Provider, Type } from '@nestjs/common';
import { RouterModule } from '@nestjs/core';
import { BullModule } from '@nestjs/bull';
import type { EvolutionConfig } from '../config/evolution.config';
import { WEBHOOK_QUEUE } from '../queue/queue.constants';
import { webhookQueueOptions } from '../queue/queue.options';
import { StorageModule } from '../storage/storage.module';
import { WebhookController } from './webhook.controller';
import { WebhookDispatcherService } from './webhook-dispatcher.service';
import { WebhookProcessorService } from './webhook-processor.service';
import { WebhookHandlerRegistry } from './webhook-handler.registry';
import { WebhookSignatureGuard } from './guards/webhook-signature.guard';
import { EvolutionEventsHandler } from './handlers/evolution-events.handler';
import { WEBHOOK_HANDLERS } from './handlers/webhook-handler.interface';
import type { WebhookHandler } from './handlers/webhook-handler.interface';
import { InlineWebhookSubmitter } from './submitters/inline-webhook.submitter';
import { BullWebhookSubmitter } from './submitters/bull-webhook.submitter';
import {
  INLINE_WEBHOOK_SUBMITTER,
  WEBHOOK_SUBMITTER,
} from './submitters/webhook-submitter.interface';
import { ProcessWebhookConsumer } from './jobs/process-webhook.consumer';

export interface WebhookModuleOptions {
  config: EvolutionConfig;
  /** Handlers propios de la aplicación, además de los integrados. */
  handlers?: Type<WebhookHandler>[];
}

/**
 * Recepción de webhooks: guard de firma -> dispatcher -> (cola | en línea) -> processor.
 *
 * La cola de Bull sólo se registra con `webhook.queue` activo, así no se abre
 * una conexión a Redis que nadie usa.
 */
@Module({})
export class WebhookModule {
  static forRoot(options: WebhookModuleOptions): DynamicModule {
    const handlers = options.handlers ?? [];
    const queued = options.config.webhook.queue;

    const submitterProviders: Provider[] = queued
      ? [
          BullWebhookSubmitter,
          ProcessWebhookConsumer,
          { provide: WEBHOOK_SUBMITTER, useExisting: BullWebhookSubmitter },
        ]
      : [{ provide: WEBHOOK_SUBMITTER, useExisting: InlineWebhookSubmitter }];

    return {
      module: WebhookModule,
      imports: [
        StorageModule,
        ...(queued
          ? [
              BullModule.registerQueueAsync({
                name: WEBHOOK_QUEUE,
                useFactory: () => webhookQueueOptions(options.config),
              }),
            ]
          : []),
      ],
      controllers: [WebhookController],
      providers: [
        WebhookSignatureGuard,
        WebhookHandlerRegistry,
        WebhookProcessorService,
        WebhookDispatcherService,
        InlineWebhookSubmitter,
        EvolutionEventsHandler,
        ...handlers,
        {
          provide: WEBHOOK_HANDLERS,
          useFactory: (...resolved: WebhookHandler[]) => resolved,
          inject: [EvolutionEventsHandler, ...handlers],
        },
        { provide: INLINE_WEBHOOK_SUBMITTER, useExisting: InlineWebhookSubmitter },
        ...submitterProviders,
      ],
      exports: [WebhookProcessorService],
    };
  }
}

/** Monta el controller bajo `webhook.path`. */
export function webhookRouter(config: EvolutionConfig): DynamicModule {
  return RouterModule.register([
    { path: config.webhook.path, module: WebhookModule },
  ]);
}
