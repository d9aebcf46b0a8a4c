#!/usr/bin/env node
import 'reflect-metadata';
import 'dotenv/config';
import { CommandFactory } from 'nest-commander';
import { CliModule } from './cli/cli.module';

async function bootstrap() {
  await CommandFactory.run(CliModule, ['warn', 'error']);
}
void bootstrap();
