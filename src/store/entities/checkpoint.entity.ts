import { Entity, Column, PrimaryColumn, UpdateDateColumn } from 'typeorm';

/**
 * Resume marker. Only ever written after the state it describes is durable.
 */
@Entity('checkpoints')
export class Checkpoint {
  @PrimaryColumn({ length: 36 })
  campaignId!: string;

  @Column({ type: 'varchar', length: 120, nullable: true })
  lastCompletedUnitId!: string | null;

  @Column({ type: 'varchar', length: 120, nullable: true })
  currentUnitId!: string | null;

  /** Discovery for the current unit is durable */
  @Column({ default: false })
  currentUnitDiscovered!: boolean;

  @Column({ type: 'int', default: 0 })
  itemsCompletedInUnit!: number;

  @Column({ type: 'int', default: 0 })
  unitsCompleted!: number;

  @UpdateDateColumn()
  updatedAt!: Date;
}
