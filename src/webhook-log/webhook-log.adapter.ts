import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { LessThan, Repository } from 'typeorm';
import { WebhookLog } from './entities/webhook-log.entity';
import type { WebhookLogEntry, WebhookLogPort } from '../ports';

@Injectable()
export class WebhookLogAdapter implements WebhookLogPort {
  constructor(
    @InjectRepository(WebhookLog)
    private readonly webhookLogRepository: Repository<WebhookLog>,
  ) {}

  async save(entry: WebhookLogEntry): Promise<void> {
    await this.webhookLogRepository.save(
      this.webhookLogRepository.create(entry),
    );
  }

  countOlderThan(date: Date): Promise<number> {
    return this.webhookLogRepository.countBy({ createdAt: LessThan(date) });
  }

  async deleteOlderThan(date: Date): Promise<number> {
    const result = await this.webhookLogRepository.delete({
      createdAt: LessThan(date),
    });
    return result.affected ?? 0;
  }
}
