import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
} from 'typeorm';

@Entity('evolution_instances')
export class EvolutionInstance {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', unique: true }) // Nombre de la instancia en Evolution
  name!: string;

  @Column({ type: 'varchar', default: 'default' })
  connectionName!: string;

  @Column({ type: 'varchar', default: 'disconnected' })
  status!: string;

  @Column({ type: 'varchar', nullable: true })
  phoneNumber!: string | null;

  @Column({ type: 'varchar', nullable: true })
  profileName!: string | null;

  @Column({ type: 'text', nullable: true })
  profilePictureUrl!: string | null;

  @Column({ type: 'timestamp', nullable: true })
  lastSeenAt!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
