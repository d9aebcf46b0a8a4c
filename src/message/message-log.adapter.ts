import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { LessThan, Repository } from 'typeorm';
import { EvolutionMessage } from './entities/evolution-message.entity';
import type { MessageLogEntry, MessageLogPort } from '../ports';

@Injectable()
export class MessageLogAdapter implements MessageLogPort {
  constructor(
    @InjectRepository(EvolutionMessage)
    private readonly messageRepository: Repository<EvolutionMessage>,
  ) {}

  async save(entry: MessageLogEntry): Promise<void> {
    await this.messageRepository.save(this.messageRepository.create(entry));
  }

  countOlderThan(date: Date): Promise<number> {
    return this.messageRepository.countBy({ createdAt: LessThan(date) });
  }

  async deleteOlderThan(date: Date): Promise<number> {
    const result = await this.messageRepository.delete({
      createdAt: LessThan(date),
    });
    return result.affected ?? 0;
  }
}
