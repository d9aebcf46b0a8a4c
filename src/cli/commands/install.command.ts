import { Inject } from '@nestjs/common';
import {
  Command,
  CommandRunner,
  InquirerService,
  Option,
} from 'nest-commander';
import { EVOLUTION_CONFIG } from '../../config/evolution.config';
import type { EvolutionConfig } from '../../config/evolution.config';
import { errorMessage } from '../../common/record.utils';
import { CliOutput } from '../cli-output.service';
import { InstallerService } from '../services/installer.service';
import type { InstallAnswers } from '../services/installer.service';
import { INSTALL_QUESTIONS } from './install.questions';

interface InstallCommandOptions {
  force?: boolean;
}

@Command({
  name: 'install',
  description: 'Write the Evolution API settings to .env and run the migrations',
})
export class InstallCommand extends CommandRunner {
  constructor(
    private readonly inquirer: InquirerService,
    private readonly installer: InstallerService,
    private readonly output: CliOutput,
    @Inject(EVOLUTION_CONFIG)
    private readonly config: EvolutionConfig,
  ) {
    super();
  }

  async run(_params: string[], options: InstallCommandOptions = {}): Promise<void> {
    this.output.info('Evolution API setup');

    const answers = await this.inquirer.ask<InstallAnswers>(
      INSTALL_QUESTIONS,
      undefined,
    );

    try {
      const result = await this.installer.writeEnv(answers, options.force ?? false);

      if (result.written.length > 0) {
        this.output.success(
          `Wrote ${result.written.join(', ')} to ${this.installer.envFile}`,
        );
      }

      if (result.skipped.length > 0) {
        this.output.warn(
          `Kept existing ${result.skipped.join(', ')} (use --force to overwrite)`,
        );
      }
    } catch (error: unknown) {
      this.output.error(`Could not write .env: ${errorMessage(error)}`);
      process.exitCode = 1;
      return;
    }

    if (answers.runMigrations) {
      try {
        const executed = await this.installer.runMigrations();
        this.output.success(
          executed.length > 0
            ? `Ran migrations: ${executed.join(', ')}`
            : 'Database schema is up to date.',
        );
      } catch (error: unknown) {
        this.output.error(`Migrations failed: ${errorMessage(error)}`);
        process.exitCode = 1;
        return;
      }
    }

    this.output.line();
    this.output.line(
      `Configure the instance webhook as POST https://<your-host>/${this.config.webhook.path}`,
    );

    if (this.config.webhook.verifySignature && this.config.webhook.secret === null) {
      this.output.warn(
        'EVOLUTION_WEBHOOK_SECRET is empty: webhook signatures will not be checked.',
      );
    }
  }

  @Option({ flags: '-f, --force', description: 'Overwrite existing .env keys' })
  parseForce(): boolean {
    return true;
  }
}
