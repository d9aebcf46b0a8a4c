import { Injectable } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { firstString, getPath, isRecord } from '../../common/record.utils';
import {
  ConnectionUpdatedEvent,
  EvolutionEvents,
  MessageEchoedEvent,
  MessageReceivedEvent,
  MessageStatusEvent,
  QrCodeReceivedEvent,
} from '../../events/evolution.events';
import type { WebhookPayload } from '../types/webhook-payload.type';
import {
  detectMessageType,
  getConnectionState,
  getMessageData,
  getMessageId,
  getPairingCode,
  getQrCode,
  getRemoteJid,
  isFromGroup,
  normalizeEventName,
  toConnectionStatus,
} from '../utils/webhook-payload.utils';
import type { WebhookHandler } from './webhook-handler.interface';

type PayloadHandler = (payload: WebhookPayload) => void;

/**
 * Traduce los eventos principales de Evolution a eventos de dominio tipados.
 */
@Injectable()
export class EvolutionEventsHandler implements WebhookHandler {
  private readonly routes: Record<string, PayloadHandler> = {
    MESSAGES_UPSERT: (payload) => this.onMessageUpsert(payload),
    MESSAGES_UPDATE: (payload) => this.onMessageUpdate(payload),
    SEND_MESSAGE: (payload) => this.onSendMessage(payload),
    CONNECTION_UPDATE: (payload) => this.onConnectionUpdate(payload),
    QRCODE_UPDATED: (payload) => this.onQrCodeUpdated(payload),
  };

  readonly events = Object.keys(this.routes);

  constructor(private readonly eventEmitter: EventEmitter2) {}

  handle(payload: WebhookPayload): void {
    this.routes[normalizeEventName(payload.event)]?.(payload);
  }

  private onMessageUpsert(payload: WebhookPayload): void {
    const message = getMessageData(payload);
    const remoteJid = getRemoteJid(payload);
    const isGroup = isFromGroup(payload);
    const sender = isGroup
      ? firstString(message, ['key.participant', 'participant'])
      : remoteJid;

    this.eventEmitter.emit(
      EvolutionEvents.MESSAGE_RECEIVED,
      new MessageReceivedEvent(
        payload.instanceName,
        message,
        sender,
        detectMessageType(message),
        isGroup,
        isGroup ? remoteJid : null,
      ),
    );
  }

  private onMessageUpdate(payload: WebhookPayload): void {
    const status = getPath(payload.data, 'data.status') ?? payload.data.status;

    if (typeof status !== 'string' && typeof status !== 'number') {
      return;
    }

    const event = new MessageStatusEvent(
      payload.instanceName,
      getMessageId(payload) ?? firstString(payload.data, ['data.keyId']),
      getRemoteJid(payload),
      status,
    );

    if (status === 3 || status === 'DELIVERY_ACK') {
      this.eventEmitter.emit(EvolutionEvents.MESSAGE_DELIVERED, event);
    } else if (status === 4 || status === 'READ') {
      this.eventEmitter.emit(EvolutionEvents.MESSAGE_READ, event);
    }
  }

  private onSendMessage(payload: WebhookPayload): void {
    const message = getMessageData(payload);

    this.eventEmitter.emit(
      EvolutionEvents.MESSAGE_ECHOED,
      new MessageEchoedEvent(
        payload.instanceName,
        detectMessageType(message),
        message,
      ),
    );
  }

  private onConnectionUpdate(payload: WebhookPayload): void {
    const rawState = getConnectionState(payload);
    const data = payload.data.data;

    this.eventEmitter.emit(
      EvolutionEvents.CONNECTION_UPDATED,
      new ConnectionUpdatedEvent(
        payload.instanceName,
        toConnectionStatus(rawState),
        rawState,
        isRecord(data) ? data : payload.data,
      ),
    );
  }

  private onQrCodeUpdated(payload: WebhookPayload): void {
    const attempt = getPath(payload.data, 'data.qrcode.count');

    this.eventEmitter.emit(
      EvolutionEvents.QRCODE_RECEIVED,
      new QrCodeReceivedEvent(
        payload.instanceName,
        getQrCode(payload),
        getPairingCode(payload),
        typeof attempt === 'number' ? attempt : null,
      ),
    );
  }
}
