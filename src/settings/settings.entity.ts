import { Entity, Column, PrimaryColumn, UpdateDateColumn } from 'typeorm';

export const SETTINGS_ID = 1;

/**
 * Process-wide settings. There is exactly one row, with id {@link SETTINGS_ID}.
 */
@Entity('settings')
export class Settings {
  @PrimaryColumn({ type: 'integer' })
  id!: number;

  @Column({ type: 'varchar' })
  apiToken!: string;

  @Column({ type: 'varchar', nullable: true })
  agentUrl!: string | null;

  @Column({ type: 'varchar', nullable: true })
  agentApiKey!: string | null;

  @Column({ type: 'varchar' })
  baseUrl!: string;

  @UpdateDateColumn()
  updatedAt!: Date;
}
