import { DynamicModule, Global, Module } from '@nestjs/common';
import {
  EVOLUTION_CONFIG,
  EvolutionConfig,
  loadEvolutionConfig,
} from './evolution.config';

@Global()
@Module({})
export class EvolutionConfigModule {
  static forRoot(config: EvolutionConfig = loadEvolutionConfig()): DynamicModule {
    return {
      module: EvolutionConfigModule,
      providers: [{ provide: EVOLUTION_CONFIG, useValue: config }],
      exports: [EVOLUTION_CONFIG],
    };
  }
}
