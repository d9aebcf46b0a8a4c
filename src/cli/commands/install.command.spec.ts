import { Test } from '@nestjs/testing';
import { InquirerService } from 'nest-commander';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { EVOLUTION_CONFIG } from '../../config/evolution.config';
import { RecordingOutput } from '../../../test/fakes/recording-output';
import { testConfig } from '../../../test/fakes/test-config';
import { CliOutput } from '../cli-output.service';
import { CliDatabase } from '../services/cli-database.service';
import { ENV_FILE_PATH, InstallerService } from '../services/installer.service';
import type { InstallAnswers } from '../services/installer.service';
import { InstallCommand } from './install.command';
import { INSTALL_QUESTIONS } from './install.questions';

describe('InstallCommand', () => {
  let dir: string;
  let output: RecordingOutput;
  let runMigrations: jest.Mock;
  let answers: InstallAnswers;
  let command: InstallCommand;
  let ask: jest.Mock;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'evolution-cli-'));
    output = new RecordingOutput();
    runMigrations = jest
      .fn()
      .mockResolvedValue(['EvolutionSchema1760800000000']);
    answers = {
      serverUrl: 'http://evolution.test',
      apiKey: 'test-key',
      defaultInstance: 'ventas',
      runMigrations: true,
    };
    ask = jest.fn(() => Promise.resolve(answers));

    const moduleRef = await Test.createTestingModule({
      providers: [
        InstallCommand,
        InstallerService,
        { provide: ENV_FILE_PATH, useValue: join(dir, '.env') },
        { provide: CliDatabase, useValue: { runMigrations } },
        { provide: InquirerService, useValue: { ask } },
        { provide: CliOutput, useValue: output },
        {
          provide: EVOLUTION_CONFIG,
          useValue: testConfig({ webhook: { secret: 'test-secret' } }),
        },
      ],
    }).compile();

    command = moduleRef.get(InstallCommand);
  });

  afterEach(async () => {
    process.exitCode = undefined;
    await rm(dir, { recursive: true, force: true });
  });

  it('escribe el .env, migra e indica la URL del webhook', async () => {
    await command.run([]);

    expect(ask).toHaveBeenCalledWith(INSTALL_QUESTIONS, undefined);
    await expect(readFile(join(dir, '.env'), 'utf8')).resolves.toContain(
      'EVOLUTION_API_KEY=test-key\n',
    );
    expect(runMigrations).toHaveBeenCalledTimes(1);
    expect(output.stdout).toEqual([
      '🔎 Evolution API setup',
      `✅ Wrote EVOLUTION_API_URL, EVOLUTION_API_KEY, EVOLUTION_DEFAULT_INSTANCE to ${join(dir, '.env')}`,
      '✅ Ran migrations: EvolutionSchema1760800000000',
      '',
      'Configure the instance webhook as POST https://<your-host>/api/evolution-api/webhook',
    ]);
    expect(output.stderr).toEqual([]);
  });

  it('no migra si se responde que no', async () => {
    answers.runMigrations = false;

    await command.run([]);

    expect(runMigrations).not.toHaveBeenCalled();
  });

  it('sale con 1 si las migraciones fallan', async () => {
    runMigrations.mockRejectedValue(new Error('connect ECONNREFUSED'));

    await command.run([]);

    expect(output.stderr).toEqual([
      '❌ Migrations failed: connect ECONNREFUSED',
    ]);
    expect(process.exitCode).toBe(1);
  });
});
