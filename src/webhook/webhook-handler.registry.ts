import { Inject, Injectable, Logger } from '@nestjs/common';
import { isKnownEvent, normalizeEventName } from './utils/webhook-payload.utils';
import { WEBHOOK_HANDLERS } from './handlers/webhook-handler.interface';
import type { WebhookHandler } from './handlers/webhook-handler.interface';

const WILDCARD = '*';

/**
 * Mapa explícito evento -> handlers, construido una sola vez al arrancar.
 */
@Injectable()
export class WebhookHandlerRegistry {
  private readonly logger = new Logger(WebhookHandlerRegistry.name);
  private readonly handlers = new Map<string, WebhookHandler[]>();

  constructor(@Inject(WEBHOOK_HANDLERS) handlers: WebhookHandler[]) {
    for (const handler of handlers) {
      for (const event of handler.events) {
        const key = normalizeEventName(event);

        if (key !== WILDCARD && !isKnownEvent(key)) {
          this.logger.warn(
            `⚠️ ${handler.constructor.name} escucha un evento que Evolution no emite: ${event}`,
          );
        }

        this.handlers.set(key, [...(this.handlers.get(key) ?? []), handler]);
      }
    }

    this.logger.log(
      `Handlers registrados para: ${this.registeredEvents().join(', ') || '(ninguno)'}`,
    );
  }

  /** Primero los handlers del evento, después los comodín. */
  resolve(event: string): WebhookHandler[] {
    const key = normalizeEventName(event);
    const exact = key === WILDCARD ? [] : (this.handlers.get(key) ?? []);

    return [...exact, ...(this.handlers.get(WILDCARD) ?? [])];
  }

  /** Nombres normalizados, en orden de registro. */
  registeredEvents(): string[] {
    return [...this.handlers.keys()];
  }
}
