import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SLEEP, sleep } from '../../common/sleep';
import { BotSubscriber } from '../bot/entities/bot-subscriber.entity';
import { PaymentsModule } from '../payments/payments.module';
import { PostbackModule } from '../postback/postback.module';
import { AttributionController } from './attribution.controller';
import { AttributionMaintenanceService } from './attribution-maintenance.service';
import { AttributionStoreService } from './attribution-store.service';
import { ConversionChainService } from './conversion-chain.service';
import { ConversionRecord } from './entities/conversion-record.entity';
import { TrackingRecord } from './entities/tracking-record.entity';

@Module({
  imports: [
    TypeOrmModule.forFeature([TrackingRecord, ConversionRecord, BotSubscriber]),
    PaymentsModule,
    PostbackModule,
  ],
  controllers: [AttributionController],
  providers: [
    AttributionStoreService,
    ConversionChainService,
    AttributionMaintenanceService,
    { provide: SLEEP, useValue: sleep },
  ],
  exports: [AttributionStoreService, ConversionChainService],
})
export class AttributionModule {}
