import { Inject, Injectable, Logger } from '@nestjs/common';
import { DEFAULT_CONNECTION } from '../../config/evolution.config';
import { EvolutionApiError } from '../../common/errors';
import { firstString } from '../../common/record.utils';
import { EVOLUTION_CLIENT, INSTANCE_PORT } from '../../ports';
import type {
  ApiResponse,
  EvolutionClientPort,
  InstancePort,
} from '../../ports';
import { toInstanceSummaries } from '../../evolution-api/utils/evolution-api.utils';
import type { InstanceSummary } from '../../evolution-api/utils/evolution-api.utils';

export interface ConnectResult {
  qrCode: string | null;
  pairingCode: string | null;
}

function ensureSuccess(response: ApiResponse, action: string): void {
  if (!response.success) {
    throw new EvolutionApiError(
      `${action} failed: ${response.message ?? `HTTP ${response.statusCode}`}`,
      response.statusCode,
    );
  }
}

/**
 * Operaciones sobre instancias del servidor Evolution (list/sync/connect/disconnect).
 */
@Injectable()
export class InstanceManagerService {
  private readonly logger = new Logger(InstanceManagerService.name);

  constructor(
    @Inject(EVOLUTION_CLIENT)
    private readonly client: EvolutionClientPort,
    @Inject(INSTANCE_PORT)
    private readonly instances: InstancePort,
  ) {}

  async list(connection: string | null): Promise<InstanceSummary[]> {
    const response = await this.client.fetchInstances(connection);
    ensureSuccess(response, 'Fetching instances');
    return toInstanceSummaries(response.data);
  }

  async sync(connection: string | null, now = new Date()): Promise<number> {
    const summaries = await this.list(connection);

    for (const summary of summaries) {
      await this.instances.upsert({
        name: summary.name,
        connectionName: connection ?? DEFAULT_CONNECTION,
        status: summary.status.toLowerCase(),
        phoneNumber: summary.owner,
        profileName: summary.profileName,
        profilePictureUrl: summary.profilePictureUrl,
        lastSeenAt: now,
      });
    }

    this.logger.log(`🔄 ${summaries.length} instancias sincronizadas`);
    return summaries.length;
  }

  async connect(
    instance: string,
    connection: string | null,
  ): Promise<ConnectResult> {
    const response = await this.client.connect(instance, connection);
    ensureSuccess(response, `Connecting ${instance}`);

    return {
      qrCode: firstString(response.data, ['base64', 'qrcode.base64']),
      pairingCode: firstString(response.data, [
        'pairingCode',
        'qrcode.pairingCode',
      ]),
    };
  }

  async disconnect(instance: string, connection: string | null): Promise<void> {
    const response = await this.client.logout(instance, connection);
    ensureSuccess(response, `Disconnecting ${instance}`);
  }
}
