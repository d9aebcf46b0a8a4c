/**
 * Puerto de salida: cliente HTTP del servidor Evolution API.
 */
export interface EvolutionClientPort {
  sendText(
    instance: string,
    body: Record<string, unknown>,
    connection?: string | null,
  ): Promise<ApiResponse>;
  sendMedia(
    instance: string,
    body: Record<string, unknown>,
    connection?: string | null,
  ): Promise<ApiResponse>;
  sendAudio(
    instance: string,
    body: Record<string, unknown>,
    connection?: string | null,
  ): Promise<ApiResponse>;
  sendLocation(
    instance: string,
    body: Record<string, unknown>,
    connection?: string | null,
  ): Promise<ApiResponse>;
  fetchInstances(connection?: string | null): Promise<ApiResponse>;
  connectionState(
    instance: string,
    connection?: string | null,
  ): Promise<ApiResponse>;
  connect(instance: string, connection?: string | null): Promise<ApiResponse>;
  logout(instance: string, connection?: string | null): Promise<ApiResponse>;
  ping(connection?: string | null): Promise<PingResult>;
  serverUrl(connection?: string | null): string;
}

export interface ApiResponse {
  success: boolean;
  statusCode: number;
  data: unknown;
  message: string | null;
}

export interface PingResult {
  success: boolean;
  statusCode: number | null;
  responseTimeMs: number;
  message: string | null;
}

export const EVOLUTION_CLIENT = Symbol('EVOLUTION_CLIENT');
