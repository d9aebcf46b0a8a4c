import { Inject, Injectable } from '@nestjs/common';
import { readFile, writeFile } from 'node:fs/promises';
import { mergeEnvEntries } from '../utils/env-file.utils';
import type { EnvMergeResult } from '../utils/env-file.utils';
import { CliDatabase } from './cli-database.service';

export const ENV_FILE_PATH = Symbol('ENV_FILE_PATH');

export interface InstallAnswers {
  serverUrl: string;
  apiKey: string;
  defaultInstance: string;
  runMigrations: boolean;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

@Injectable()
export class InstallerService {
  constructor(
    @Inject(ENV_FILE_PATH)
    private readonly envPath: string,
    private readonly database: CliDatabase,
  ) {}

  get envFile(): string {
    return this.envPath;
  }

  async writeEnv(answers: InstallAnswers, force: boolean): Promise<EnvMergeResult> {
    const current = await this.readEnv();
    const result = mergeEnvEntries(
      current,
      {
        EVOLUTION_API_URL: answers.serverUrl,
        EVOLUTION_API_KEY: answers.apiKey,
        EVOLUTION_DEFAULT_INSTANCE: answers.defaultInstance,
      },
      force,
    );

    if (result.written.length > 0) {
      await writeFile(this.envPath, result.content, 'utf8');
    }

    return result;
  }

  runMigrations(): Promise<string[]> {
    return this.database.runMigrations();
  }

  private async readEnv(): Promise<string> {
    try {
      return await readFile(this.envPath, 'utf8');
    } catch (error: unknown) {
      if (isMissingFile(error)) {
        return '';
      }
      throw error;
    }
  }
}
