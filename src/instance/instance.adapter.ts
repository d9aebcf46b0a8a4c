import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { EvolutionInstance } from './entities/evolution-instance.entity';
import type { InstancePort, InstanceSnapshot } from '../ports';

/**
 * Adaptador: Implementa el puerto InstancePort usando TypeORM.
 */
@Injectable()
export class InstanceAdapter implements InstancePort {
  constructor(
    @InjectRepository(EvolutionInstance)
    private readonly instanceRepository: Repository<EvolutionInstance>,
  ) {}

  async upsert(instance: InstanceSnapshot): Promise<void> {
    const existing = await this.instanceRepository.findOneBy({
      name: instance.name,
    });

    await this.instanceRepository.save(
      this.instanceRepository.create({ ...existing, ...instance }),
    );
  }
}
