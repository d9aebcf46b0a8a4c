export class InvalidWebhookPayloadError extends Error {
  constructor(message = 'Invalid payload') {
    super(message);
    this.name = 'InvalidWebhookPayloadError';
  }
}

/** Error fatal: nunca se reintenta. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class MessageSendError extends Error {
  constructor(
    message: string,
    readonly statusCode: number | null = null,
  ) {
    super(message);
    this.name = 'MessageSendError';
  }
}

export class EvolutionApiError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
  ) {
    super(message);
    this.name = 'EvolutionApiError';
  }
}

export class EvolutionConnectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EvolutionConnectionError';
  }
}
