import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { EVOLUTION_CONFIG } from '../config/evolution.config';
import type { EvolutionConfig } from '../config/evolution.config';
import { MessageSendError } from '../common/errors';
import { errorMessage, firstString } from '../common/record.utils';
import {
  EvolutionEvents,
  MessageFailedEvent,
  MessageSentEvent,
} from '../events/evolution.events';
import {
  EVOLUTION_CLIENT,
  FAILED_MESSAGE_PORT,
  MESSAGE_LOG_PORT,
} from '../ports';
import type {
  ApiResponse,
  EvolutionClientPort,
  FailedMessagePort,
  MessageLogPort,
} from '../ports';
import { SendMessageJob } from './send-message.job';
import type { MessageJobSpec } from './types/message-job.type';
import { assertSendable, recipientOf } from './utils/message-request.utils';

/**
 * Ejecuta un intento de envío y aplica sus efectos: eventos, registro de
 * mensajes fallidos e historial. El runtime (Bull o en línea) decide si
 * reintenta.
 */
@Injectable()
export class SendMessageAttemptService {
  private readonly logger = new Logger(SendMessageAttemptService.name);

  constructor(
    @Inject(EVOLUTION_CLIENT)
    private readonly client: EvolutionClientPort,
    @Inject(FAILED_MESSAGE_PORT)
    private readonly failedMessages: FailedMessagePort,
    @Inject(MESSAGE_LOG_PORT)
    private readonly messageLog: MessageLogPort,
    private readonly eventEmitter: EventEmitter2,
    @Inject(EVOLUTION_CONFIG)
    private readonly config: EvolutionConfig,
  ) {}

  async perform(job: SendMessageJob): Promise<ApiResponse> {
    // ConfigurationError: antes de tocar la red y sin estado intermedio
    assertSendable(job.spec, this.config.connections);

    const attempt = job.begin();
    const { spec } = job;

    try {
      const response = await this.send(spec);

      if (!response.success) {
        throw new MessageSendError(
          response.message ?? `HTTP ${response.statusCode}`,
          response.statusCode,
        );
      }

      job.succeed();
      await this.onSuccess(job, response);
      return response;
    } catch (error: unknown) {
      const message = errorMessage(error);
      const outcome = job.fail();

      this.logger.warn(
        `❌ Envío ${spec.messageType} a ${recipientOf(spec) ?? '?'} falló (intento ${attempt}/${job.maxTries}): ${message}`,
      );
      this.eventEmitter.emit(
        EvolutionEvents.MESSAGE_FAILED,
        new MessageFailedEvent(spec, message, attempt, false),
      );
      await this.recordFailure(job, message);

      if (outcome === 'exhausted') {
        this.logger.error(
          `Envío agotado tras ${attempt} intentos (${spec.instanceName})`,
        );
        this.eventEmitter.emit(
          EvolutionEvents.MESSAGE_FAILED,
          new MessageFailedEvent(spec, message, attempt, true),
        );
        await this.writeHistory(spec, 'failed', null, message);
      }

      throw error;
    }
  }

  private send(spec: MessageJobSpec): Promise<ApiResponse> {
    const body = { ...spec.message };

    switch (spec.messageType) {
      case 'text':
        return this.client.sendText(spec.instanceName, body, spec.connectionName);
      case 'media':
        return this.client.sendMedia(spec.instanceName, body, spec.connectionName);
      case 'audio':
        return this.client.sendAudio(spec.instanceName, body, spec.connectionName);
      case 'location':
        return this.client.sendLocation(
          spec.instanceName,
          body,
          spec.connectionName,
        );
    }
  }

  private async onSuccess(
    job: SendMessageJob,
    response: ApiResponse,
  ): Promise<void> {
    const { spec } = job;

    this.logger.log(
      `✅ Mensaje ${spec.messageType} enviado a ${recipientOf(spec) ?? '?'} (${spec.instanceName})`,
    );
    this.eventEmitter.emit(
      EvolutionEvents.MESSAGE_SENT,
      new MessageSentEvent(spec, response),
    );

    const failedId = job.failedMessageId;

    if (failedId) {
      await this.persist('borrar mensaje fallido', () =>
        this.failedMessages.delete(failedId),
      );
    }

    await this.writeHistory(spec, 'sent', response, null);
  }

  private async recordFailure(
    job: SendMessageJob,
    message: string,
  ): Promise<void> {
    const existing = job.failedMessageId;

    if (existing) {
      await this.persist('actualizar mensaje fallido', () =>
        this.failedMessages.registerRetryFailure(existing, message),
      );
      return;
    }

    await this.persist('registrar mensaje fallido', async () => {
      const record = await this.failedMessages.record({
        instanceName: job.spec.instanceName,
        recipient: recipientOf(job.spec),
        messageType: job.spec.messageType,
        payload: job.spec.message,
        connectionName: job.spec.connectionName,
        error: message,
      });
      job.attachFailedRecord(record.id);
    });
  }

  private async writeHistory(
    spec: MessageJobSpec,
    status: 'sent' | 'failed',
    response: ApiResponse | null,
    failure: string | null,
  ): Promise<void> {
    if (!this.config.database.storeMessages) {
      return;
    }

    await this.persist('guardar historial', () =>
      this.messageLog.save({
        messageId: firstString(response?.data, ['key.id']),
        instanceName: spec.instanceName,
        remoteJid:
          firstString(response?.data, ['key.remoteJid']) ?? recipientOf(spec),
        messageType: spec.messageType,
        status,
        payload: spec.message,
        response: response?.data ?? null,
        errorMessage: failure,
      }),
    );
  }

  // Un fallo de persistencia se loguea; no cambia el resultado del envío
  private async persist(
    action: string,
    operation: () => Promise<void>,
  ): Promise<void> {
    try {
      await operation();
    } catch (error: unknown) {
      this.logger.error(`No se pudo ${action}: ${errorMessage(error)}`);
    }
  }
}
