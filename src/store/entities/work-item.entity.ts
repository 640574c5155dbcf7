import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import {
  FailureKind,
  ProcessingStage,
  WorkItemPayload,
} from '../interfaces/campaign-state.interface';

@Entity('work_items')
@Index(['campaignId', 'externalId'], { unique: true })
@Index(['campaignId', 'unitId'])
export class WorkItem {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 36 })
  campaignId!: string;

  @Column({ length: 120 })
  unitId!: string;

  /** Rank of the unit in the plan, for result ordering */
  @Column({ type: 'int' })
  unitRank!: number;

  @Column({ length: 255 })
  externalId!: string;

  /** Discovery order within the unit */
  @Column({ type: 'int' })
  ordinal!: number;

  @Column({ type: 'varchar', length: 20 })
  stage!: ProcessingStage;

  @Column({ length: 255 })
  name!: string;

  @Column({ length: 320 })
  contactChannel!: string;

  @Column({ type: 'simple-json' })
  payload!: WorkItemPayload;

  @Column({ type: 'varchar', length: 40, nullable: true })
  failureKind!: FailureKind | null;

  @Column({ type: 'text', nullable: true })
  failureReason!: string | null;

  /** Stage the item was attempting when it failed */
  @Column({ type: 'varchar', length: 20, nullable: true })
  failedStage!: string | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
