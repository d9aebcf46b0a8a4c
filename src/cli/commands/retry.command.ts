import { Command, CommandRunner, Option } from 'nest-commander';
import { errorMessage } from '../../common/record.utils';
import { CliOutput } from '../cli-output.service';
import { CliDatabase } from '../services/cli-database.service';
import { FailedMessageRetryService } from '../services/failed-message-retry.service';
import type { RetryOutcome } from '../services/failed-message-retry.service';

interface RetryCommandOptions {
  instance?: string;
  maxRetries?: number;
  limit?: number;
  dryRun?: boolean;
}

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_LIMIT = 100;

function positiveInteger(value: string, flag: string): number {
  const parsed = Number(value);

  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${flag} must be a positive integer`);
  }

  return parsed;
}

@Command({
  name: 'retry',
  description: 'Retry failed outgoing messages',
})
export class RetryCommand extends CommandRunner {
  constructor(
    private readonly retries: FailedMessageRetryService,
    private readonly database: CliDatabase,
    private readonly output: CliOutput,
  ) {
    super();
  }

  async run(_params: string[], options: RetryCommandOptions = {}): Promise<void> {
    const dryRun = options.dryRun ?? false;

    try {
      await this.database.connect();
      const report = await this.retries.retry(
        {
          ...(options.instance ? { instanceName: options.instance } : {}),
          maxRetries: options.maxRetries ?? DEFAULT_MAX_RETRIES,
          limit: options.limit ?? DEFAULT_LIMIT,
          dryRun,
        },
        (outcome) => this.printOutcome(outcome),
      );

      if (report.candidates.length === 0) {
        this.output.success('No failed messages to retry.');
        return;
      }

      if (dryRun) {
        this.output.table(
          ['Id', 'Instance', 'Recipient', 'Type', 'Retries', 'Last error'],
          report.candidates.map((record) => [
            record.id,
            record.instanceName,
            record.recipient,
            record.messageType,
            record.retryCount,
            record.lastError,
          ]),
        );
        this.output.line(`Would retry ${report.candidates.length} messages.`);
        return;
      }

      this.output.line(
        `Retried ${report.outcomes.length} messages: ${report.succeeded} succeeded, ${report.failed} failed.`,
      );

      if (report.failed > 0) {
        process.exitCode = 1;
      }
    } catch (error: unknown) {
      this.output.error(errorMessage(error));
      process.exitCode = 1;
    }
  }

  private printOutcome(outcome: RetryOutcome): void {
    const target = `${outcome.record.id} (${outcome.record.instanceName} -> ${outcome.record.recipient ?? '?'})`;

    if (outcome.success) {
      this.output.success(`Sent ${target}`);
    } else {
      this.output.error(`Failed ${target}: ${outcome.error ?? 'unknown error'}`);
    }
  }

  @Option({ flags: '-i, --instance <name>', description: 'Only this instance' })
  parseInstance(value: string): string {
    return value;
  }

  @Option({
    flags: '--max-retries <count>',
    description: 'Skip records retried this many times (default 3)',
  })
  parseMaxRetries(value: string): number {
    return positiveInteger(value, '--max-retries');
  }

  @Option({
    flags: '-l, --limit <count>',
    description: 'Maximum records per run (default 100)',
  })
  parseLimit(value: string): number {
    return positiveInteger(value, '--limit');
  }

  @Option({ flags: '--dry-run', description: 'Only list what would be retried' })
  parseDryRun(): boolean {
    return true;
  }
}
