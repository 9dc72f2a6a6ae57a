import { Column, Entity, Index } from 'typeorm';
import { AbstractEntity } from '../../../common/entities/abstract.entity';

@Entity('tracking_records')
@Index('idx_tracking_records_lastVisitTime', ['lastVisitTime'])
@Index('idx_tracking_records_visitCount', ['visitCount'])
export class TrackingRecord extends AbstractEntity {
  // Not unique: older deployments re-created rows, the newest one wins.
  @Index('idx_tracking_records_userId')
  @Column({ type: 'varchar', length: 64 })
  userId!: string;

  @Column({ type: 'varchar', length: 64 })
  clientId!: string;

  @Column({ type: 'varchar', length: 32, nullable: true })
  counterId!: string | null;

  @Column({ type: 'datetime', nullable: true })
  firstVisitTime!: Date | null;

  @Column({ type: 'datetime', nullable: true })
  lastVisitTime!: Date | null;

  @Column({ type: 'int', default: 1 })
  visitCount!: number;
}
