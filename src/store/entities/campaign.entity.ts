import {
  Entity,
  Column,
  PrimaryColumn,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import {
  CampaignStatus,
  ControlRequest,
  StatusReason,
} from '../interfaces/campaign-state.interface';

@Entity('campaigns')
@Index(['status', 'heartbeatAt'])
export class Campaign {
  @PrimaryColumn({ length: 36 })
  id!: string;

  @Column({ length: 120 })
  regionKey!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  regionLabel!: string | null;

  @Column({ type: 'simple-json' })
  keywords!: string[];

  @Column({ length: 20, default: 'aggressive' })
  profile!: string;

  @Column({ type: 'double precision' })
  costCeiling!: number;

  @Column({ type: 'double precision', default: 0 })
  estimatedCost!: number;

  @Column({ type: 'varchar', length: 20, default: CampaignStatus.PENDING })
  status!: CampaignStatus;

  @Column({ type: 'varchar', length: 40, nullable: true })
  statusReason!: StatusReason | null;

  @Column({ type: 'text', nullable: true })
  statusDetail!: string | null;

  @Column({ type: 'varchar', length: 20, nullable: true })
  controlRequest!: ControlRequest | null;

  @Column({ type: 'double precision', default: 0 })
  costSpent!: number;

  @Column({ type: 'int', default: 0 })
  unitsProcessed!: number;

  @Column({ type: 'int', default: 0 })
  unitsPlanned!: number;

  @Column({ type: Date, nullable: true })
  startedAt!: Date | null;

  @Column({ type: Date, nullable: true })
  completedAt!: Date | null;

  @Column({ type: Date, nullable: true })
  heartbeatAt!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
