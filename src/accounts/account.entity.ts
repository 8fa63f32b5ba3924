import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
} from 'typeorm';
import { Exclude } from 'class-transformer';
import { Industry } from './industry.enum';
import type { Contact } from '../contacts/contact.entity';

export enum EnrichmentState {
  READY = 'ready',
  ENRICHING = 'enriching',
}

@Entity('accounts')
export class Account {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar' })
  name!: string;

  @Column({ type: 'varchar', nullable: true })
  industry!: Industry | null;

  @Column({ type: 'varchar', nullable: true })
  website!: string | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @Column({
    type: 'simple-enum',
    enum: EnrichmentState,
    default: EnrichmentState.READY,
  })
  enrichmentState!: EnrichmentState;

  // Correlates agent callbacks with the in-flight request
  @Exclude()
  @Column({ type: 'varchar', length: 36, nullable: true })
  enrichmentRequestId!: string | null;

  @OneToMany('Contact', 'account')
  contacts?: Contact[];

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
