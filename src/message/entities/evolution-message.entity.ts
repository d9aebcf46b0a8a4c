import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  Index,
} from 'typeorm';
import type { MessageType } from '../../messaging/types/message-job.type';

@Entity('evolution_messages')
export class EvolutionMessage {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', nullable: true }) // key.id devuelto por Evolution
  messageId!: string | null;

  @Index()
  @Column({ type: 'varchar' })
  instanceName!: string;

  @Column({ type: 'varchar', nullable: true })
  remoteJid!: string | null;

  @Column({ type: 'varchar', default: 'text' })
  messageType!: MessageType;

  @Column({ type: 'varchar' })
  status!: 'sent' | 'failed';

  @Column({ type: 'jsonb', default: {} })
  payload!: Record<string, unknown>;

  @Column({ type: 'jsonb', nullable: true })
  response!: unknown;

  @Column({ type: 'text', nullable: true })
  errorMessage!: string | null;

  @Index()
  @CreateDateColumn()
  createdAt!: Date;
}
