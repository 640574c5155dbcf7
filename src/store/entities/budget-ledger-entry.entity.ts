import { Entity, Column, PrimaryGeneratedColumn, Index } from 'typeorm';
import { Capability } from '../../scheduler/interfaces/scheduler.interface';

@Entity('budget_ledger')
@Index(['campaignId', 'capability'], { unique: true })
export class BudgetLedgerEntry {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ length: 36 })
  campaignId!: string;

  @Column({ type: 'varchar', length: 20 })
  capability!: Capability;

  @Column({ type: 'int', default: 0 })
  callsMade!: number;

  @Column({ type: 'int', default: 0 })
  failures!: number;

  @Column({ type: 'double precision', default: 0 })
  costAccrued!: number;

  @Column({ type: Date, nullable: true })
  lastCallAt!: Date | null;
}
