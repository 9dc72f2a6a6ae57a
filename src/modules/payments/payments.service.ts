import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Payment, PaymentStatus } from './entities/payment.entity';
import { TrackingRecord } from '../attribution/entities/tracking-record.entity';
import { ConversionRecord } from '../attribution/entities/conversion-record.entity';

export type SucceededPaymentInput = {
  paymentId: string;
  userId: string;
  amount: number;
  currency: string;
  subscriptionMonths: number;
  promoCode?: string | null;
};

@Injectable()
export class PaymentsService {
  constructor(
    @InjectRepository(Payment)
    private readonly paymentRepo: Repository<Payment>,
  ) {}

  async findByPaymentId(paymentId: string): Promise<Payment | null> {
    return this.paymentRepo.findOne({ where: { paymentId } });
  }

  /**
   * Stores the purchase reported by the payment processor so a failed
   * conversion can be found again by the resend batch.
   */
  async recordSucceeded(input: SucceededPaymentInput): Promise<Payment> {
    const existing = await this.findByPaymentId(input.paymentId);
    if (existing) {
      if (existing.status !== PaymentStatus.SUCCEEDED) {
        existing.status = PaymentStatus.SUCCEEDED;
        return this.paymentRepo.save(existing);
      }
      return existing;
    }

    return this.paymentRepo.save(
      this.paymentRepo.create({
        paymentId: input.paymentId,
        userId: input.userId,
        amount: input.amount,
        currency: input.currency,
        status: PaymentStatus.SUCCEEDED,
        subscriptionMonths: input.subscriptionMonths,
        promoCode: input.promoCode ?? null,
      }),
    );
  }

  /** Succeeded payments of tracked users with no conversion sent yet, oldest first. */
  async findUnconvertedSucceeded(limit: number): Promise<Payment[]> {
    return this.paymentRepo
      .createQueryBuilder('payment')
      .where('payment.status = :status', { status: PaymentStatus.SUCCEEDED })
      .andWhere(
        (qb) =>
          `EXISTS ${qb
            .subQuery()
            .select('1')
            .from(TrackingRecord, 'tracking')
            .where('tracking.userId = payment.userId')
            .getQuery()}`,
      )
      .andWhere(
        (qb) =>
          `NOT EXISTS ${qb
            .subQuery()
            .select('1')
            .from(ConversionRecord, 'conversion')
            .where('conversion.userId = payment.userId')
            .andWhere('conversion.paymentId = payment.paymentId')
            .getQuery()}`,
      )
      .orderBy('payment.createdAt', 'ASC')
      .addOrderBy('payment.id', 'ASC')
      .limit(limit)
      .getMany();
  }
}
