import {
  Body,
  Controller,
  Get,
  HttpCode,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { InternalTokenGuard } from '../../common/guards/internal-token.guard';
import { AttributionStoreService } from './attribution-store.service';
import { ConversionChainService } from './conversion-chain.service';
import { CleanupTrackingDto } from './dto/cleanup-tracking.dto';
import { PurchaseSignalDto } from './dto/purchase-signal.dto';
import { ResendConversionsDto } from './dto/resend-conversions.dto';
import { TopVisitorsQueryDto } from './dto/top-visitors-query.dto';

const DEFAULT_CLEANUP_DAYS = 30;
const DEFAULT_RESEND_LIMIT = 50;

@Controller('attribution')
@UseGuards(InternalTokenGuard)
export class AttributionController {
  constructor(
    private readonly store: AttributionStoreService,
    private readonly conversionChain: ConversionChainService,
  ) {}

  @Post('purchases')
  @HttpCode(200)
  async purchase(@Body() dto: PurchaseSignalDto) {
    return this.conversionChain.handlePurchaseSignal({
      userId: dto.userId,
      paymentId: dto.paymentId,
      amount: dto.amount,
      subscriptionMonths: dto.subscriptionMonths,
      currency: dto.currency?.toUpperCase(),
      promoCode: dto.promoCode ?? null,
    });
  }

  @Get('stats')
  async stats() {
    return this.store.statistics();
  }

  @Get('visitors/top')
  async topVisitors(@Query() query: TopVisitorsQueryDto) {
    const records = await this.store.topVisitors(query.limit ?? 10);
    const now = Date.now();
    return records.map((record) => ({
      userId: record.userId,
      visitCount: record.visitCount,
      lastVisitTime: record.lastVisitTime?.toISOString() ?? null,
      hoursSinceLastVisit: record.lastVisitTime
        ? Math.round(((now - record.lastVisitTime.getTime()) / 3_600_000) * 10) /
          10
        : null,
    }));
  }

  @Post('conversions/resend')
  @HttpCode(200)
  async resend(@Body() dto: ResendConversionsDto) {
    return this.conversionChain.resendMissingConversions(
      dto.limit ?? DEFAULT_RESEND_LIMIT,
    );
  }

  @Post('cleanup')
  @HttpCode(200)
  async cleanup(@Body() dto: CleanupTrackingDto) {
    const days = dto.days ?? DEFAULT_CLEANUP_DAYS;
    const deleted = await this.store.cleanup(days);
    return { days, deleted };
  }

  @Post('self-test')
  @HttpCode(200)
  async selfTest() {
    return this.conversionChain.runSelfTest();
  }
}
