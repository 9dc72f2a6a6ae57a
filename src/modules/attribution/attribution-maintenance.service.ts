import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron } from '@nestjs/schedule';
import { AttributionStoreService } from './attribution-store.service';

@Injectable()
export class AttributionMaintenanceService {
  private readonly logger = new Logger(AttributionMaintenanceService.name);
  private readonly retentionDays: number | null;

  constructor(
    private readonly store: AttributionStoreService,
    configService: ConfigService,
  ) {
    const raw = configService.get<number>('TRACKING_RETENTION_DAYS');
    this.retentionDays =
      typeof raw === 'number' && Number.isInteger(raw) && raw > 0 ? raw : null;
  }

  @Cron('30 3 * * *')
  async purgeStaleTrackingCron() {
    await this.purgeStaleTracking();
  }

  /** Returns the number of removed rows, or null when retention is disabled. */
  async purgeStaleTracking(): Promise<number | null> {
    if (this.retentionDays === null) {
      return null;
    }
    try {
      return await this.store.cleanup(this.retentionDays);
    } catch (error) {
      this.logger.error('Scheduled tracking cleanup failed', error as Error);
      return null;
    }
  }
}
