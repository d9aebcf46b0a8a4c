import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import {
  FAILED_MESSAGE_PORT,
  INSTANCE_PORT,
  MESSAGE_LOG_PORT,
  WEBHOOK_LOG_PORT,
} from '../ports';
import { EvolutionInstance } from '../instance/entities/evolution-instance.entity';
import { InstanceAdapter } from '../instance/instance.adapter';
import { EvolutionMessage } from '../message/entities/evolution-message.entity';
import { MessageLogAdapter } from '../message/message-log.adapter';
import { FailedMessage } from '../failed-message/entities/failed-message.entity';
import { FailedMessageAdapter } from '../failed-message/failed-message.adapter';
import { WebhookLog } from '../webhook-log/entities/webhook-log.entity';
import { WebhookLogAdapter } from '../webhook-log/webhook-log.adapter';

/**
 * Puertos de persistencia -> adaptadores TypeORM. Los servicios sólo conocen
 * los puertos; en tests se reemplaza este módulo por fakes en memoria.
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([
      EvolutionInstance,
      EvolutionMessage,
      FailedMessage,
      WebhookLog,
    ]),
  ],
  providers: [
    { provide: INSTANCE_PORT, useClass: InstanceAdapter },
    { provide: MESSAGE_LOG_PORT, useClass: MessageLogAdapter },
    { provide: FAILED_MESSAGE_PORT, useClass: FailedMessageAdapter },
    { provide: WEBHOOK_LOG_PORT, useClass: WebhookLogAdapter },
  ],
  exports: [INSTANCE_PORT, MESSAGE_LOG_PORT, FAILED_MESSAGE_PORT, WEBHOOK_LOG_PORT],
})
export class StorageModule {}
