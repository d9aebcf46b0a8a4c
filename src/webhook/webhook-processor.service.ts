import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { EVOLUTION_CONFIG } from '../config/evolution.config';
import type { EvolutionConfig } from '../config/evolution.config';
import { errorMessage } from '../common/record.utils';
import {
  EvolutionEvents,
  WebhookReceivedEvent,
} from '../events/evolution.events';
import { WEBHOOK_LOG_PORT } from '../ports';
import type { WebhookLogPort } from '../ports';
import { WebhookHandlerRegistry } from './webhook-handler.registry';
import type { WebhookPayload } from './types/webhook-payload.type';
import { isKnownEvent } from './utils/webhook-payload.utils';

@Injectable()
export class WebhookProcessorService {
  private readonly logger = new Logger(WebhookProcessorService.name);

  constructor(
    private readonly registry: WebhookHandlerRegistry,
    private readonly eventEmitter: EventEmitter2,
    @Inject(WEBHOOK_LOG_PORT)
    private readonly webhookLog: WebhookLogPort,
    @Inject(EVOLUTION_CONFIG)
    private readonly config: EvolutionConfig,
  ) {}

  /**
   * Notifica la recepción y ejecuta en orden los handlers del evento.
   * Un error de un handler se propaga al llamador.
   */
  async process(payload: WebhookPayload): Promise<void> {
    const startedAt = Date.now();

    this.eventEmitter.emit(
      EvolutionEvents.WEBHOOK_RECEIVED,
      new WebhookReceivedEvent(payload),
    );

    const handlers = this.registry.resolve(payload.event);

    if (handlers.length === 0) {
      this.logger.debug(
        isKnownEvent(payload.event)
          ? `Sin handlers para ${payload.event}`
          : `Evento desconocido ${payload.event}, se registra sin procesar`,
      );
    }

    try {
      for (const handler of handlers) {
        await handler.handle(payload);
      }
    } catch (error: unknown) {
      this.logger.error(
        `❌ Error procesando ${payload.event}: ${errorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      await this.recordLog(payload, startedAt, errorMessage(error));
      throw error;
    }

    await this.recordLog(payload, startedAt, null);
  }

  private async recordLog(
    payload: WebhookPayload,
    startedAt: number,
    failure: string | null,
  ): Promise<void> {
    if (!this.config.database.storeWebhooks) {
      return;
    }

    try {
      await this.webhookLog.save({
        instanceName: payload.instanceName,
        event: payload.event,
        payload: payload.data,
        status: failure === null ? 'processed' : 'failed',
        errorMessage: failure,
        processingTimeMs: Date.now() - startedAt,
      });
    } catch (error: unknown) {
      this.logger.error(
        `No se pudo guardar el log del webhook ${payload.event}: ${errorMessage(error)}`,
      );
    }
  }
}
