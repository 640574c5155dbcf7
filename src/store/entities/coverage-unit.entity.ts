import { Entity, Column, PrimaryColumn } from 'typeorm';
import { DensityClass } from '../../coverage/interfaces/coverage.interface';

/** One unit of a campaign's persisted coverage plan */
@Entity('coverage_units')
export class CoverageUnitRecord {
  @PrimaryColumn({ length: 36 })
  campaignId!: string;

  @PrimaryColumn({ length: 120 })
  unitId!: string;

  @Column({ length: 120 })
  regionKey!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  label!: string | null;

  @Column({ type: 'varchar', length: 20 })
  densityClass!: DensityClass;

  @Column({ type: 'int' })
  expectedCount!: number;

  @Column({ type: 'double precision' })
  weight!: number;

  @Column({ type: 'int' })
  rank!: number;

  /** Set when discovery for the unit failed and the unit was skipped */
  @Column({ type: 'varchar', length: 500, nullable: true })
  discoveryFailure!: string | null;

  @Column({ type: Date, nullable: true })
  discoveryFailedAt!: Date | null;
}
