import { Inject } from '@nestjs/common';
import { Command, CommandRunner, Option } from 'nest-commander';
import { EVOLUTION_CONFIG } from '../../config/evolution.config';
import type { EvolutionConfig } from '../../config/evolution.config';
import { errorMessage } from '../../common/record.utils';
import { CliOutput } from '../cli-output.service';
import { CliDatabase } from '../services/cli-database.service';
import { PruneService } from '../services/prune.service';

interface PruneCommandOptions {
  days?: number;
  messages?: boolean;
  webhooks?: boolean;
  all?: boolean;
  dryRun?: boolean;
}

@Command({
  name: 'prune',
  description: 'Delete message history, failed messages and webhook logs older than N days',
})
export class PruneCommand extends CommandRunner {
  constructor(
    private readonly pruner: PruneService,
    private readonly database: CliDatabase,
    private readonly output: CliOutput,
    @Inject(EVOLUTION_CONFIG)
    private readonly config: EvolutionConfig,
  ) {
    super();
  }

  async run(_params: string[], options: PruneCommandOptions = {}): Promise<void> {
    const days = options.days ?? this.config.database.pruneAfterDays;

    if (!Number.isInteger(days) || days < 0) {
      this.output.error('--days must be a non-negative integer');
      process.exitCode = 1;
      return;
    }

    const all = options.all ?? false;
    const dryRun = options.dryRun ?? false;

    try {
      await this.database.connect();
      const report = await this.pruner.prune({
        days,
        messages: all || (options.messages ?? false),
        webhooks: all || (options.webhooks ?? false),
        dryRun,
      });

      this.output.info(`Cutoff: ${report.cutoff.toISOString()} (${days} days)`);
      this.output.table(
        ['Table', 'Records'],
        [
          ['evolution_messages', report.counts.messages],
          ['evolution_failed_messages', report.counts.failedMessages],
          ['evolution_webhook_logs', report.counts.webhookLogs],
        ],
      );

      if (dryRun) {
        this.output.line(`Would delete ${report.total} total records.`);
      } else {
        this.output.success(`Deleted ${report.total} total records.`);
      }
    } catch (error: unknown) {
      this.output.error(errorMessage(error));
      process.exitCode = 1;
    }
  }

  @Option({
    flags: '-d, --days <days>',
    description: 'Delete records older than this many days',
  })
  parseDays(value: string): number {
    return Number(value);
  }

  @Option({ flags: '--messages', description: 'Only message history and failed messages' })
  parseMessages(): boolean {
    return true;
  }

  @Option({ flags: '--webhooks', description: 'Only webhook logs' })
  parseWebhooks(): boolean {
    return true;
  }

  @Option({ flags: '--all', description: 'Every table (same as no selector)' })
  parseAll(): boolean {
    return true;
  }

  @Option({ flags: '--dry-run', description: 'Only count what would be deleted' })
  parseDryRun(): boolean {
    return true;
  }
}
