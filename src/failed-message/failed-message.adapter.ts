import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { LessThan, Repository } from 'typeorm';
import { FailedMessage } from './entities/failed-message.entity';
import type {
  FailedMessageData,
  FailedMessagePort,
  NewFailedMessage,
  RetryableFilter,
} from '../ports';

/**
 * Adaptador: Implementa el puerto FailedMessagePort usando TypeORM.
 */
@Injectable()
export class FailedMessageAdapter implements FailedMessagePort {
  constructor(
    @InjectRepository(FailedMessage)
    private readonly failedMessageRepository: Repository<FailedMessage>,
  ) {}

  async record(failure: NewFailedMessage): Promise<FailedMessageData> {
    const saved = await this.failedMessageRepository.save(
      this.failedMessageRepository.create({
        instanceName: failure.instanceName,
        recipient: failure.recipient,
        messageType: failure.messageType,
        payload: failure.payload,
        connectionName: failure.connectionName,
        lastError: failure.error,
        retryCount: 0,
      }),
    );

    return this.toData(saved);
  }

  async registerRetryFailure(id: string, error: string): Promise<void> {
    // Incremento atómico en la base, sin leer antes
    await this.failedMessageRepository.increment({ id }, 'retryCount', 1);
    await this.failedMessageRepository.update(id, { lastError: error });
  }

  async delete(id: string): Promise<void> {
    await this.failedMessageRepository.delete(id);
  }

  async findRetryable(filter: RetryableFilter): Promise<FailedMessageData[]> {
    const query = this.failedMessageRepository
      .createQueryBuilder('failed')
      .where('failed.retryCount < :maxRetries', {
        maxRetries: filter.maxRetries,
      })
      .orderBy('failed.createdAt', 'ASC')
      .take(filter.limit);

    if (filter.instanceName) {
      query.andWhere('failed.instanceName = :instanceName', {
        instanceName: filter.instanceName,
      });
    }

    const rows = await query.getMany();
    return rows.map((row) => this.toData(row));
  }

  countOlderThan(date: Date): Promise<number> {
    return this.failedMessageRepository.countBy({ createdAt: LessThan(date) });
  }

  async deleteOlderThan(date: Date): Promise<number> {
    const result = await this.failedMessageRepository.delete({
      createdAt: LessThan(date),
    });
    return result.affected ?? 0;
  }

  private toData(row: FailedMessage): FailedMessageData {
    return {
      id: row.id,
      instanceName: row.instanceName,
      recipient: row.recipient,
      messageType: row.messageType,
      payload: row.payload,
      connectionName: row.connectionName,
      retryCount: row.retryCount,
      lastError: row.lastError,
      createdAt: row.createdAt,
    };
  }
}
