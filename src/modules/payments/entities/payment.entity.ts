import { Column, Entity, Index } from 'typeorm';
import { AbstractEntity } from '../../../common/entities/abstract.entity';
import { decimalTransformer } from '../../../common/transformers/decimal.transformer';

export enum PaymentStatus {
  PENDING = 'pending',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
  REFUNDED = 'refunded',
}

@Entity('payments')
@Index('idx_payments_status', ['status'])
export class Payment extends AbstractEntity {
  // Identifier issued by the payment provider; conversions are keyed on it.
  @Index('uq_payments_paymentId', { unique: true })
  @Column({ type: 'varchar', length: 128 })
  paymentId!: string;

  @Index('idx_payments_userId')
  @Column({ type: 'varchar', length: 64 })
  userId!: string;

  @Column({
    type: 'decimal',
    precision: 12,
    scale: 2,
    transformer: decimalTransformer,
  })
  amount!: number;

  @Column({ type: 'varchar', length: 3, default: 'RUB' })
  currency!: string;

  @Column({ type: 'varchar', length: 16, default: PaymentStatus.PENDING })
  status!: PaymentStatus;

  @Column({ type: 'int', default: 1 })
  subscriptionMonths!: number;

  @Column({ type: 'varchar', length: 64, nullable: true })
  promoCode!: string | null;
}
