import { Column, Entity, Index } from 'typeorm';
import { AbstractEntity } from '../../../common/entities/abstract.entity';
import { decimalTransformer } from '../../../common/transformers/decimal.transformer';

@Entity('conversion_records')
@Index('uq_conversion_records_user_payment', ['userId', 'paymentId'], {
  unique: true,
})
export class ConversionRecord extends AbstractEntity {
  @Index('idx_conversion_records_userId')
  @Column({ type: 'varchar', length: 64 })
  userId!: string;

  @Index('idx_conversion_records_paymentId')
  @Column({ type: 'varchar', length: 128 })
  paymentId!: string;

  @Column({
    type: 'decimal',
    precision: 12,
    scale: 2,
    transformer: decimalTransformer,
  })
  amount!: number;

  @Column({ type: 'varchar', length: 3, default: 'RUB' })
  currency!: string;

  @Column({ type: 'datetime' })
  sentAt!: Date;
}
