// Tokens de inyección de las colas; el nombre real en Redis sale de la config.
export const WEBHOOK_QUEUE = 'evolution-webhooks';
export const MESSAGE_QUEUE = 'evolution-messages';

export const PROCESS_WEBHOOK_JOB = 'process-webhook';
export const SEND_MESSAGE_JOB = 'send-message';

export const WEBHOOK_JOB_ATTEMPTS = 3;
export const WEBHOOK_JOB_BACKOFF_SECONDS = [10, 30, 60];
