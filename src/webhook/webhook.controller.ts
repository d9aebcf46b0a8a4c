import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  Post,
  UseFilters,
  UseGuards,
} from '@nestjs/common';
import { WebhookDispatcherService } from './webhook-dispatcher.service';
import type { WebhookDispatchResult } from './webhook-dispatcher.service';
import { WebhookSignatureGuard } from './guards/webhook-signature.guard';
import { WebhookExceptionFilter } from './filters/webhook-exception.filter';

const INSTANCE_NAME = /^[a-zA-Z0-9_-]+$/;

// La ruta base la define RouterModule a partir de `webhook.path`
@Controller()
@UseFilters(WebhookExceptionFilter)
export class WebhookController {
  constructor(private readonly dispatcher: WebhookDispatcherService) {}

  @Get('health')
  health(): { status: 'ok'; service: string; timestamp: string } {
    return {
      status: 'ok',
      service: 'evolution-api-webhook',
      timestamp: new Date().toISOString(),
    };
  }

  @Post()
  @HttpCode(HttpStatus.OK)
  @UseGuards(WebhookSignatureGuard)
  receive(@Body() body: unknown): Promise<WebhookDispatchResult> {
    return this.dispatcher.dispatch(body, null);
  }

  @Post(':instance')
  @HttpCode(HttpStatus.OK)
  @UseGuards(WebhookSignatureGuard)
  receiveForInstance(
    @Param('instance') instance: string,
    @Body() body: unknown,
  ): Promise<WebhookDispatchResult> {
    if (!INSTANCE_NAME.test(instance)) {
      throw new NotFoundException({
        status: 'error',
        message: 'Unknown instance route',
      });
    }

    return this.dispatcher.dispatch(body, instance);
  }
}
