import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { InvalidWebhookPayloadError } from '../../common/errors';
import { errorMessage, isRecord } from '../../common/record.utils';

/**
 * Todas las respuestas de error del webhook tienen la forma
 * `{ status: 'error', message }`.
 */
@Catch()
export class WebhookExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(WebhookExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();

    if (exception instanceof HttpException) {
      const body = exception.getResponse();

      response
        .status(exception.getStatus())
        .json(
          isRecord(body) && body.status === 'error'
            ? body
            : { status: 'error', message: exception.message },
        );
      return;
    }

    if (exception instanceof InvalidWebhookPayloadError) {
      response
        .status(HttpStatus.BAD_REQUEST)
        .json({ status: 'error', message: 'Invalid payload' });
      return;
    }

    this.logger.error(
      `Error procesando webhook: ${errorMessage(exception)}`,
      exception instanceof Error ? exception.stack : undefined,
    );
    response
      .status(HttpStatus.INTERNAL_SERVER_ERROR)
      .json({ status: 'error', message: errorMessage(exception) });
  }
}
