import { Inject, Injectable, Logger } from '@nestjs/common';
import { EVOLUTION_CONFIG } from '../config/evolution.config';
import type { EvolutionConfig } from '../config/evolution.config';
import { MESSAGE_SUBMITTER } from './submitters/message-submitter.interface';
import type {
  MessageDispatchResult,
  MessageSubmitter,
} from './submitters/message-submitter.interface';
import type { MessageJobSpec } from './types/message-job.type';
import {
  assertSendable,
  mediaMessage,
  textMessage,
} from './utils/message-request.utils';

/**
 * Punto de entrada para enviar mensajes: valida y entrega el job al runtime
 * configurado (cola de Bull o en línea).
 */
@Injectable()
export class MessageDispatcherService {
  private readonly logger = new Logger(MessageDispatcherService.name);

  constructor(
    @Inject(MESSAGE_SUBMITTER)
    private readonly submitter: MessageSubmitter,
    @Inject(EVOLUTION_CONFIG)
    private readonly config: EvolutionConfig,
  ) {}

  async dispatch(spec: MessageJobSpec): Promise<MessageDispatchResult> {
    assertSendable(spec, this.config.connections);

    const result = await this.submitter.submit(spec);

    if (result.mode === 'queued') {
      this.logger.log(
        `📤 Mensaje ${spec.messageType} encolado (job ${result.jobId})`,
      );
    }

    return result;
  }

  sendText(
    instanceName: string,
    number: string,
    text: string,
    options: Record<string, unknown> = {},
  ): Promise<MessageDispatchResult> {
    return this.dispatch(textMessage(instanceName, number, text, options));
  }

  sendMedia(
    instanceName: string,
    number: string,
    mediatype: 'image' | 'video' | 'document' | 'audio',
    media: string,
    options: Record<string, unknown> = {},
  ): Promise<MessageDispatchResult> {
    return this.dispatch(
      mediaMessage(instanceName, number, mediatype, media, options),
    );
  }
}
