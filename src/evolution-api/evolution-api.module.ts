import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { EVOLUTION_CLIENT } from '../ports';
import { EvolutionClientAdapter } from './adapters/evolution-client.adapter';

@Module({
  imports: [HttpModule],
  providers: [{ provide: EVOLUTION_CLIENT, useClass: EvolutionClientAdapter }],
  exports: [EVOLUTION_CLIENT],
})
export class EvolutionApiModule {}
