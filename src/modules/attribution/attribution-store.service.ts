import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { TrackingRecord } from './entities/tracking-record.entity';
import { ConversionRecord } from './entities/conversion-record.entity';

const DAY_MS = 24 * 60 * 60 * 1000;

export type RecordConversionResult =
  | { created: true; record: ConversionRecord }
  | { created: false; reason: 'already_exists' };

export type AttributionStatistics = {
  totalTrackings: number;
  conversionsSent: number;
  uniqueUsersWithConversions: number;
  totalRevenue: number;
  totalVisits: number;
  averageVisitsPerUser: number;
  usersWithMultipleVisits: number;
  visitsLast24h: number;
};

@Injectable()
export class AttributionStoreService {
  private readonly logger = new Logger(AttributionStoreService.name);

  constructor(
    @InjectRepository(TrackingRecord)
    private readonly trackingRepo: Repository<TrackingRecord>,
    @InjectRepository(ConversionRecord)
    private readonly conversionRepo: Repository<ConversionRecord>,
  ) {}

  async upsertTracking(
    userId: string,
    clientId: string,
    counterId: string | null,
  ): Promise<TrackingRecord> {
    const normalizedClientId = clientId.trim();
    const now = new Date();
    const existing = await this.getTracking(userId);

    if (!existing) {
      const created = await this.trackingRepo.save(
        this.trackingRepo.create({
          userId,
          clientId: normalizedClientId,
          counterId,
          firstVisitTime: now,
          lastVisitTime: now,
          visitCount: 1,
        }),
      );
      this.logger.log(
        `Tracking created for user ${userId} with client id ${normalizedClientId}`,
      );
      return created;
    }

    const clientChanged = existing.clientId !== normalizedClientId;
    await this.trackingRepo
      .createQueryBuilder()
      .update(TrackingRecord)
      .set({
        ...(clientChanged ? { clientId: normalizedClientId, counterId } : {}),
        lastVisitTime: now,
        visitCount: () => 'visitCount + 1',
      })
      .where('id = :id', { id: existing.id })
      .execute();

    this.logger.log(
      clientChanged
        ? `Tracking for user ${userId} switched to client id ${normalizedClientId}`
        : `Visit recorded for user ${userId}`,
    );

    const refreshed = await this.trackingRepo.findOne({
      where: { id: existing.id },
    });
    return refreshed ?? existing;
  }

  async getTracking(userId: string): Promise<TrackingRecord | null> {
    return this.trackingRepo.findOne({
      where: { userId },
      order: { createdAt: 'DESC', id: 'DESC' },
    });
  }

  /** Call at most once per reconciled visit; every call counts a visit. */
  async touchVisit(trackingId: number): Promise<boolean> {
    const result = await this.trackingRepo
      .createQueryBuilder()
      .update(TrackingRecord)
      .set({
        lastVisitTime: new Date(),
        visitCount: () => 'visitCount + 1',
      })
      .where('id = :id', { id: trackingId })
      .execute();
    return (result.affected ?? 0) > 0;
  }

  async hasConversion(userId: string, paymentId: string): Promise<boolean> {
    const count = await this.conversionRepo.count({
      where: { userId, paymentId },
    });
    return count > 0;
  }

  async recordConversion(
    userId: string,
    paymentId: string,
    amount: number,
    currency = 'RUB',
  ): Promise<RecordConversionResult> {
    if (await this.hasConversion(userId, paymentId)) {
      this.logger.log(
        `Conversion already exists for user ${userId}, payment ${paymentId}`,
      );
      return { created: false, reason: 'already_exists' };
    }

    try {
      const record = await this.conversionRepo.save(
        this.conversionRepo.create({
          userId,
          paymentId,
          amount,
          currency,
          sentAt: new Date(),
        }),
      );
      this.logger.log(
        `Saved conversion record for user ${userId}, payment ${paymentId}`,
      );
      return { created: true, record };
    } catch (error) {
      if (this.isDuplicateKeyError(error)) {
        return { created: false, reason: 'already_exists' };
      }
      throw error;
    }
  }

  async statistics(): Promise<AttributionStatistics> {
    const since = new Date(Date.now() - DAY_MS);

    const [trackingRow, conversionRow, usersWithMultipleVisits, visitsLast24h] =
      await Promise.all([
        this.trackingRepo
          .createQueryBuilder('tracking')
          .select('COUNT(tracking.id)', 'total')
          .addSelect('SUM(tracking.visitCount)', 'visits')
          .addSelect('AVG(tracking.visitCount)', 'average')
          .getRawOne<{
            total: string | number | null;
            visits: string | number | null;
            average: string | number | null;
          }>(),
        this.conversionRepo
          .createQueryBuilder('conversion')
          .select('COUNT(conversion.id)', 'total')
          .addSelect('COUNT(DISTINCT conversion.userId)', 'users')
          .addSelect('SUM(conversion.amount)', 'revenue')
          .getRawOne<{
            total: string | number | null;
            users: string | number | null;
            revenue: string | number | null;
          }>(),
        this.trackingRepo
          .createQueryBuilder('tracking')
          .where('tracking.visitCount > :min', { min: 1 })
          .getCount(),
        this.trackingRepo
          .createQueryBuilder('tracking')
          .where('tracking.lastVisitTime >= :since', { since })
          .getCount(),
      ]);

    const average = this.toNumber(trackingRow?.average);

    return {
      totalTrackings: this.toNumber(trackingRow?.total),
      conversionsSent: this.toNumber(conversionRow?.total),
      uniqueUsersWithConversions: this.toNumber(conversionRow?.users),
      totalRevenue: this.toNumber(conversionRow?.revenue),
      totalVisits: this.toNumber(trackingRow?.visits),
      averageVisitsPerUser: Math.round(average * 100) / 100,
      usersWithMultipleVisits,
      visitsLast24h,
    };
  }

  async topVisitors(limit = 10): Promise<TrackingRecord[]> {
    const safeLimit = Math.min(Math.max(Math.floor(limit), 1), 100);
    return this.trackingRepo.find({
      order: { visitCount: 'DESC', id: 'ASC' },
      take: safeLimit,
    });
  }

  /** Removes stale, unconverted tracking rows. Conversions are never touched. */
  async cleanup(olderThanDays = 30): Promise<number> {
    const cutoff = new Date(Date.now() - olderThanDays * DAY_MS);

    const convertedUsers = this.conversionRepo
      .createQueryBuilder('conversion')
      .select('conversion.userId')
      .getQuery();

    const result = await this.trackingRepo
      .createQueryBuilder()
      .delete()
      .from(TrackingRecord)
      .where('lastVisitTime < :cutoff', { cutoff })
      .andWhere(`userId NOT IN (${convertedUsers})`)
      .execute();

    const deleted = result.affected ?? 0;
    this.logger.log(
      `Removed ${deleted} tracking records older than ${olderThanDays} days`,
    );
    return deleted;
  }

  private toNumber(value: string | number | null | undefined): number {
    const parsed = Number(value ?? 0);
    return Number.isFinite(parsed) ? parsed : 0;
  }

  private isDuplicateKeyError(error: unknown): boolean {
    if (typeof error !== 'object' || error === null) {
      return false;
    }
    const code = 'code' in error ? error.code : undefined;
    const errno = 'errno' in error ? error.errno : undefined;
    return (
      code === 'ER_DUP_ENTRY' ||
      errno === 1062 ||
      code === 'SQLITE_CONSTRAINT_UNIQUE'
    );
  }
}
