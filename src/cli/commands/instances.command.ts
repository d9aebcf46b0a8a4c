import {
  Command,
  CommandRunner,
  InquirerService,
  Option,
} from 'nest-commander';
import { errorMessage } from '../../common/record.utils';
import { CliOutput } from '../cli-output.service';
import { CliDatabase } from '../services/cli-database.service';
import { InstanceManagerService } from '../services/instance-manager.service';
import { CONFIRM_DISCONNECT } from './confirm.questions';
import type { ConfirmAnswer } from './confirm.questions';

const ACTIONS = ['list', 'sync', 'connect', 'disconnect'] as const;

type InstanceAction = (typeof ACTIONS)[number];

interface InstancesCommandOptions {
  connection?: string;
  yes?: boolean;
}

function isAction(value: string | undefined): value is InstanceAction {
  return ACTIONS.some((action) => action === value);
}

@Command({
  name: 'instances',
  arguments: '<action> [instance]',
  description: 'Manage Evolution API instances (list, sync, connect, disconnect)',
})
export class InstancesCommand extends CommandRunner {
  constructor(
    private readonly instances: InstanceManagerService,
    private readonly database: CliDatabase,
    private readonly inquirer: InquirerService,
    private readonly output: CliOutput,
  ) {
    super();
  }

  async run(
    params: string[],
    options: InstancesCommandOptions = {},
  ): Promise<void> {
    const [action, instance] = params;

    if (!isAction(action)) {
      this.output.error(`Unknown action: ${action ?? '(none)'}`);
      this.output.line(`Valid actions: ${ACTIONS.join(', ')}`);
      process.exitCode = 1;
      return;
    }

    const connection = options.connection ?? null;

    try {
      switch (action) {
        case 'list':
          return await this.list(connection);
        case 'sync':
          return await this.sync(connection);
        case 'connect':
          return await this.connect(instance, connection);
        case 'disconnect':
          return await this.disconnect(instance, connection, options.yes ?? false);
      }
    } catch (error: unknown) {
      this.output.error(errorMessage(error));
      process.exitCode = 1;
    }
  }

  private async list(connection: string | null): Promise<void> {
    const summaries = await this.instances.list(connection);

    if (summaries.length === 0) {
      this.output.warn('No instances found');
      return;
    }

    this.output.table(
      ['Instance', 'Status', 'Owner', 'Profile'],
      summaries.map((summary) => [
        summary.name,
        summary.status,
        summary.owner,
        summary.profileName,
      ]),
    );
  }

  private async sync(connection: string | null): Promise<void> {
    await this.database.connect();
    const count = await this.instances.sync(connection);
    this.output.success(`Synchronized ${count} instances.`);
  }

  private async connect(
    instance: string | undefined,
    connection: string | null,
  ): Promise<void> {
    if (!instance) {
      this.missingInstance('connect');
      return;
    }

    const result = await this.instances.connect(instance, connection);

    if (result.qrCode === null && result.pairingCode === null) {
      this.output.success(`Instance ${instance} is connecting.`);
      return;
    }

    if (result.qrCode !== null) {
      this.output.info('Scan this QR code (base64):');
      this.output.line(result.qrCode);
    }

    if (result.pairingCode !== null) {
      this.output.info(`Pairing code: ${result.pairingCode}`);
    }
  }

  private async disconnect(
    instance: string | undefined,
    connection: string | null,
    confirmed: boolean,
  ): Promise<void> {
    if (!instance) {
      this.missingInstance('disconnect');
      return;
    }

    if (!confirmed) {
      const answer = await this.inquirer.ask<ConfirmAnswer>(
        CONFIRM_DISCONNECT,
        undefined,
      );

      if (!answer.confirmed) {
        this.output.line('Cancelled.');
        return;
      }
    }

    await this.instances.disconnect(instance, connection);
    this.output.success(`Instance ${instance} disconnected.`);
  }

  private missingInstance(action: InstanceAction): void {
    this.output.error(`The ${action} action needs an instance name.`);
    process.exitCode = 1;
  }

  @Option({
    flags: '-c, --connection <name>',
    description: 'Named Evolution API connection',
  })
  parseConnection(value: string): string {
    return value;
  }

  @Option({ flags: '-y, --yes', description: 'Skip the confirmation prompt' })
  parseYes(): boolean {
    return true;
  }
}
