import { Inject, Injectable } from '@nestjs/common';
import { EVOLUTION_CLIENT } from '../../ports';
import type { EvolutionClientPort, PingResult } from '../../ports';
import { toInstanceSummaries } from '../../evolution-api/utils/evolution-api.utils';
import type { InstanceSummary } from '../../evolution-api/utils/evolution-api.utils';

export interface HealthReport {
  serverUrl: string;
  ping: PingResult;
  instances: InstanceSummary[];
  error: string | null;
  healthy: boolean;
}

@Injectable()
export class HealthCheckService {
  constructor(
    @Inject(EVOLUTION_CLIENT)
    private readonly client: EvolutionClientPort,
  ) {}

  async check(connection: string | null): Promise<HealthReport> {
    const serverUrl = this.client.serverUrl(connection);
    const ping = await this.client.ping(connection);

    if (!ping.success) {
      return {
        serverUrl,
        ping,
        instances: [],
        error: ping.message ?? `HTTP ${ping.statusCode ?? 'sin respuesta'}`,
        healthy: false,
      };
    }

    const response = await this.client.fetchInstances(connection);

    if (!response.success) {
      return {
        serverUrl,
        ping,
        instances: [],
        error: response.message ?? `HTTP ${response.statusCode}`,
        healthy: false,
      };
    }

    return {
      serverUrl,
      ping,
      instances: toInstanceSummaries(response.data),
      error: null,
      healthy: true,
    };
  }
}
