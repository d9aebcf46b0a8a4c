import { Command, CommandRunner, Option } from 'nest-commander';
import { errorMessage } from '../../common/record.utils';
import { CliOutput } from '../cli-output.service';
import { HealthCheckService } from '../services/health-check.service';

interface HealthCommandOptions {
  connection?: string;
}

@Command({
  name: 'health',
  description: 'Check connectivity with the Evolution API server',
})
export class HealthCommand extends CommandRunner {
  constructor(
    private readonly health: HealthCheckService,
    private readonly output: CliOutput,
  ) {
    super();
  }

  async run(
    _params: string[],
    options: HealthCommandOptions = {},
  ): Promise<void> {
    try {
      const report = await this.health.check(options.connection ?? null);
      this.output.info(`Evolution API: ${report.serverUrl}`);

      if (!report.ping.success) {
        this.output.error(`Server unreachable: ${report.error ?? 'unknown error'}`);
        process.exitCode = 1;
        return;
      }

      this.output.success(`Server reachable (${report.ping.responseTimeMs} ms)`);

      if (!report.healthy) {
        this.output.error(`Could not fetch instances: ${report.error ?? 'unknown error'}`);
        process.exitCode = 1;
        return;
      }

      if (report.instances.length === 0) {
        this.output.warn('No instances found');
        return;
      }

      this.output.table(
        ['Instance', 'Status', 'Owner'],
        report.instances.map((instance) => [
          instance.name,
          instance.status,
          instance.owner,
        ]),
      );
    } catch (error: unknown) {
      this.output.error(errorMessage(error));
      process.exitCode = 1;
    }
  }

  @Option({
    flags: '-c, --connection <name>',
    description: 'Named Evolution API connection',
  })
  parseConnection(value: string): string {
    return value;
  }
}
