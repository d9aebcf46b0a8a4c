import type {
  ApiResponse,
  EvolutionClientPort,
  PingResult,
} from '../../src/ports';

export interface RecordedCall {
  method: string;
  instance: string | null;
  body: Record<string, unknown> | null;
  connection: string | null;
}

type Responder = (call: RecordedCall) => ApiResponse | Promise<ApiResponse>;

export function ok(data: unknown = {}): ApiResponse {
  return { success: true, statusCode: 200, data, message: null };
}

export function failure(statusCode: number, message: string): ApiResponse {
  return { success: false, statusCode, data: { message }, message };
}

/**
 * Cliente en memoria: registra cada llamada y responde con `respond`.
 */
export class FakeEvolutionClient implements EvolutionClientPort {
  readonly calls: RecordedCall[] = [];
  respond: Responder = () => ok();
  pingResult: PingResult = {
    success: true,
    statusCode: 200,
    responseTimeMs: 12,
    message: null,
  };

  private call(
    method: string,
    instance: string | null,
    body: Record<string, unknown> | null,
    connection?: string | null,
  ): Promise<ApiResponse> {
    const recorded = { method, instance, body, connection: connection ?? null };
    this.calls.push(recorded);
    return Promise.resolve(this.respond(recorded));
  }

  sendText(instance: string, body: Record<string, unknown>, connection?: string | null) {
    return this.call('sendText', instance, body, connection);
  }

  sendMedia(instance: string, body: Record<string, unknown>, connection?: string | null) {
    return this.call('sendMedia', instance, body, connection);
  }

  sendAudio(instance: string, body: Record<string, unknown>, connection?: string | null) {
    return this.call('sendAudio', instance, body, connection);
  }

  sendLocation(instance: string, body: Record<string, unknown>, connection?: string | null) {
    return this.call('sendLocation', instance, body, connection);
  }

  fetchInstances(connection?: string | null) {
    return this.call('fetchInstances', null, null, connection);
  }

  connectionState(instance: string, connection?: string | null) {
    return this.call('connectionState', instance, null, connection);
  }

  connect(instance: string, connection?: string | null) {
    return this.call('connect', instance, null, connection);
  }

  logout(instance: string, connection?: string | null) {
    return this.call('logout', instance, null, connection);
  }

  ping(): Promise<PingResult> {
    return Promise.resolve(this.pingResult);
  }

  serverUrl(): string {
    return 'http://evolution.test';
  }
}
