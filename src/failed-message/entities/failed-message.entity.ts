import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import type { MessageType } from '../../messaging/types/message-job.type';

@Entity('evolution_failed_messages')
export class FailedMessage {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ type: 'varchar' })
  instanceName!: string;

  @Column({ type: 'varchar', nullable: true })
  recipient!: string | null;

  @Column({ type: 'varchar' })
  messageType!: MessageType;

  @Column({ type: 'jsonb', default: {} }) // Mensaje original, listo para reenviar
  payload!: Record<string, unknown>;

  @Column({ type: 'varchar', nullable: true })
  connectionName!: string | null;

  @Column({ type: 'int', default: 0 })
  retryCount!: number;

  @Column({ type: 'text', nullable: true })
  lastError!: string | null;

  @Index()
  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
