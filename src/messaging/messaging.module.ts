import { DynamicModule, Module, Provider } from '@nestjs/common';
import { BullModule } from '@nestjs/bull';
import type { EvolutionConfig } from '../config/evolution.config';
import { EvolutionApiModule } from '../evolution-api/evolution-api.module';
import { MESSAGE_QUEUE } from '../queue/queue.constants';
import { messageQueueOptions } from '../queue/queue.options';
import { StorageModule } from '../storage/storage.module';
import { MessageDispatcherService } from './message-dispatcher.service';
import { SendMessageAttemptService } from './send-message-attempt.service';
import { BullMessageSubmitter } from './submitters/bull-message.submitter';
import { InlineMessageSubmitter } from './submitters/inline-message.submitter';
import { MESSAGE_SUBMITTER } from './submitters/message-submitter.interface';
import { SendMessageConsumer } from './jobs/send-message.consumer';

/**
 * Envío de mensajes salientes con reintentos. Con `queue.enabled` los jobs van
 * a Bull; si no, se ejecutan en proceso.
 */
@Module({})
export class MessagingModule {
  static forRoot(config: EvolutionConfig): DynamicModule {
    const queued = config.queue.enabled;

    const submitterProviders: Provider[] = queued
      ? [
          BullMessageSubmitter,
          SendMessageConsumer,
          { provide: MESSAGE_SUBMITTER, useExisting: BullMessageSubmitter },
        ]
      : [
          InlineMessageSubmitter,
          { provide: MESSAGE_SUBMITTER, useExisting: InlineMessageSubmitter },
        ];

    return {
      module: MessagingModule,
      imports: [
        EvolutionApiModule,
        StorageModule,
        ...(queued
          ? [
              BullModule.registerQueueAsync({
                name: MESSAGE_QUEUE,
                useFactory: () => messageQueueOptions(config),
              }),
            ]
          : []),
      ],
      providers: [
        SendMessageAttemptService,
        MessageDispatcherService,
        ...submitterProviders,
      ],
      exports: [MessageDispatcherService, SendMessageAttemptService],
    };
  }
}
