import { Inject, Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { lastValueFrom } from 'rxjs';
import {
  DEFAULT_CONNECTION,
  EVOLUTION_CONFIG,
} from '../../config/evolution.config';
import type {
  EvolutionConfig,
  EvolutionConnectionConfig,
} from '../../config/evolution.config';
import {
  ConfigurationError,
  EvolutionConnectionError,
} from '../../common/errors';
import { errorMessage } from '../../common/record.utils';
import type {
  ApiResponse,
  EvolutionClientPort,
  PingResult,
} from '../../ports';
import { redactSensitive, toApiResponse } from '../utils/evolution-api.utils';

type HttpMethod = 'GET' | 'POST' | 'DELETE';

/**
 * Adaptador: cliente de Evolution API sobre HttpService (Axios).
 */
@Injectable()
export class EvolutionClientAdapter implements EvolutionClientPort {
  private readonly logger = new Logger(EvolutionClientAdapter.name);

  constructor(
    private readonly httpService: HttpService,
    @Inject(EVOLUTION_CONFIG)
    private readonly config: EvolutionConfig,
  ) {}

  sendText(instance: string, body: Record<string, unknown>, connection?: string | null) {
    return this.sendMessage('sendText', instance, body, connection);
  }

  sendMedia(instance: string, body: Record<string, unknown>, connection?: string | null) {
    return this.sendMessage('sendMedia', instance, body, connection);
  }

  sendAudio(instance: string, body: Record<string, unknown>, connection?: string | null) {
    return this.sendMessage('sendWhatsAppAudio', instance, body, connection);
  }

  sendLocation(instance: string, body: Record<string, unknown>, connection?: string | null) {
    return this.sendMessage('sendLocation', instance, body, connection);
  }

  fetchInstances(connection?: string | null): Promise<ApiResponse> {
    return this.request('GET', 'instance/fetchInstances', connection);
  }

  connectionState(instance: string, connection?: string | null): Promise<ApiResponse> {
    return this.request(
      'GET',
      `instance/connectionState/${encodeURIComponent(instance)}`,
      connection,
    );
  }

  connect(instance: string, connection?: string | null): Promise<ApiResponse> {
    return this.request(
      'GET',
      `instance/connect/${encodeURIComponent(instance)}`,
      connection,
    );
  }

  logout(instance: string, connection?: string | null): Promise<ApiResponse> {
    return this.request(
      'DELETE',
      `instance/logout/${encodeURIComponent(instance)}`,
      connection,
    );
  }

  async ping(connection?: string | null): Promise<PingResult> {
    const startedAt = Date.now();

    try {
      const response = await this.request('GET', '', connection);
      return {
        success: response.success,
        statusCode: response.statusCode,
        responseTimeMs: Date.now() - startedAt,
        message: response.message,
      };
    } catch (error: unknown) {
      return {
        success: false,
        statusCode: null,
        responseTimeMs: Date.now() - startedAt,
        message: errorMessage(error),
      };
    }
  }

  serverUrl(connection?: string | null): string {
    return this.resolveConnection(connection).serverUrl;
  }

  private sendMessage(
    endpoint: string,
    instance: string,
    body: Record<string, unknown>,
    connection?: string | null,
  ): Promise<ApiResponse> {
    return this.request(
      'POST',
      `message/${endpoint}/${encodeURIComponent(instance)}`,
      connection,
      body,
      this.config.http.messageTimeoutMs,
    );
  }

  private resolveConnection(
    connection?: string | null,
  ): EvolutionConnectionConfig {
    const name = connection ?? DEFAULT_CONNECTION;
    const resolved = this.config.connections[name];

    if (!resolved) {
      throw new ConfigurationError(`Unknown Evolution API connection: ${name}`);
    }

    return resolved;
  }

  private async request(
    method: HttpMethod,
    path: string,
    connection?: string | null,
    body?: Record<string, unknown>,
    timeout = this.config.http.timeoutMs,
  ): Promise<ApiResponse> {
    const { serverUrl, apiKey } = this.resolveConnection(connection);
    const url = `${serverUrl.replace(/\/+$/, '')}/${path}`;

    if (body) {
      this.logger.debug(
        `${method} ${url} ${JSON.stringify(redactSensitive(body))}`,
      );
    }

    try {
      const response = await lastValueFrom(
        this.httpService.request<unknown>({
          method,
          url,
          data: body,
          timeout,
          headers: {
            apikey: apiKey ?? '',
            Accept: 'application/json',
            'Content-Type': 'application/json',
          },
          // Los códigos HTTP se traducen a ApiResponse; sólo fallos de red lanzan
          validateStatus: () => true,
        }),
      );

      return toApiResponse(response.status, response.statusText, response.data);
    } catch (error: unknown) {
      this.logger.error(`❌ Sin respuesta de ${url}: ${errorMessage(error)}`);
      throw new EvolutionConnectionError(
        `Could not reach Evolution API at ${serverUrl}: ${errorMessage(error)}`,
      );
    }
  }
}
