import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AttributionModule } from '../attribution/attribution.module';
import { PostbackModule } from '../postback/postback.module';
import { BotService } from './bot.service';
import { BotUpdate } from './bot.update';
import { BotSubscriber } from './entities/bot-subscriber.entity';

@Module({
  imports: [
    TypeOrmModule.forFeature([BotSubscriber]),
    AttributionModule,
    PostbackModule,
  ],
  providers: [BotService, BotUpdate],
  exports: [BotService],
})
export class BotModule {}
