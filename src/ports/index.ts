// Evolution API
export type {
  EvolutionClientPort,
  ApiResponse,
  PingResult,
} from './evolution-client.port';
export { EVOLUTION_CLIENT } from './evolution-client.port';

// Mensajes fallidos
export type {
  FailedMessagePort,
  FailedMessageData,
  NewFailedMessage,
  RetryableFilter,
} from './failed-message.port';
export { FAILED_MESSAGE_PORT } from './failed-message.port';

// Historial de mensajes
export type { MessageLogPort, MessageLogEntry } from './message-log.port';
export { MESSAGE_LOG_PORT } from './message-log.port';

// Logs de webhooks
export type { WebhookLogPort, WebhookLogEntry } from './webhook-log.port';
export { WEBHOOK_LOG_PORT } from './webhook-log.port';

// Instancias
export type { InstancePort, InstanceSnapshot } from './instance.port';
export { INSTANCE_PORT } from './instance.port';
