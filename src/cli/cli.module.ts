import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { TypeOrmModule } from '@nestjs/typeorm';
import { join } from 'path';
import { EvolutionConfigModule } from '../config/evolution-config.module';
import { postgresOptions } from '../database/database.options';
import { EvolutionApiModule } from '../evolution-api/evolution-api.module';
import { SendMessageAttemptService } from '../messaging/send-message-attempt.service';
import { StorageModule } from '../storage/storage.module';
import { CliOutput } from './cli-output.service';
import { CliDatabase } from './services/cli-database.service';
import { FailedMessageRetryService } from './services/failed-message-retry.service';
import { HealthCheckService } from './services/health-check.service';
import { InstanceManagerService } from './services/instance-manager.service';
import { ENV_FILE_PATH, InstallerService } from './services/installer.service';
import { PruneService } from './services/prune.service';
import { ConfirmDisconnectQuestions } from './commands/confirm.questions';
import { HealthCommand } from './commands/health.command';
import { InstallCommand } from './commands/install.command';
import { InstallQuestions } from './commands/install.questions';
import { InstancesCommand } from './commands/instances.command';
import { PruneCommand } from './commands/prune.command';
import { RetryCommand } from './commands/retry.command';

/**
 * Módulo raíz del CLI. No registra colas ni consumers: los reintentos se
 * ejecutan en este proceso.
 */
@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    EvolutionConfigModule.forRoot(),
    EventEmitterModule.forRoot(),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        ...postgresOptions((key) => configService.get<string>(key)),
        // install y health no necesitan base de datos
        manualInitialization: true,
      }),
    }),
    StorageModule,
    EvolutionApiModule,
  ],
  providers: [
    CliOutput,
    CliDatabase,
    SendMessageAttemptService,
    HealthCheckService,
    InstanceManagerService,
    PruneService,
    FailedMessageRetryService,
    InstallerService,
    { provide: ENV_FILE_PATH, useFactory: () => join(process.cwd(), '.env') },
    InstallQuestions,
    ConfirmDisconnectQuestions,
    HealthCommand,
    InstancesCommand,
    PruneCommand,
    RetryCommand,
    InstallCommand,
  ],
})
export class CliModule {}
