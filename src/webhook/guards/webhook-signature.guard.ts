import {
  Injectable,
  CanActivate,
  ExecutionContext,
  UnauthorizedException,
  Logger,
  Inject,
} from '@nestjs/common';
import type { Request } from 'express';
import { EVOLUTION_CONFIG } from '../../config/evolution.config';
import type { EvolutionConfig } from '../../config/evolution.config';
import { verifyWebhookSignature } from '../utils/signature.utils';

// NestJS agrega rawBody cuando la app se crea con { rawBody: true }
interface RequestWithRawBody extends Request {
  rawBody?: Buffer;
}

@Injectable()
export class WebhookSignatureGuard implements CanActivate {
  private readonly logger = new Logger(WebhookSignatureGuard.name);

  constructor(
    @Inject(EVOLUTION_CONFIG) private readonly config: EvolutionConfig,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<RequestWithRawBody>();
    const { verifySignature, secret } = this.config.webhook;

    if (verifySignature && !secret) {
      this.logger.warn(
        'EVOLUTION_WEBHOOK_SECRET no está configurado. Saltando validación de firma.',
      );
    }

    const verdict = verifyWebhookSignature({
      rawBody: request.rawBody ?? Buffer.alloc(0),
      headers: request.headers,
      secret,
      verificationEnabled: verifySignature,
    });

    if (!verdict.allowed) {
      this.logger.warn(`🔒 Webhook rechazado: ${verdict.reason}`);
      throw new UnauthorizedException({
        status: 'error',
        message: verdict.reason,
      });
    }

    return true;
  }
}
