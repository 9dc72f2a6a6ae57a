import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { ThrottlerModule } from '@nestjs/throttler';
import { TelegrafModule } from 'nestjs-telegraf';
import { validate } from './config/env.validation';
import { DatabaseModule } from './modules/database/database.module';
import { MetrikaModule } from './modules/metrika/metrika.module';
import { PaymentsModule } from './modules/payments/payments.module';
import { PostbackModule } from './modules/postback/postback.module';
import { AttributionModule } from './modules/attribution/attribution.module';
import { BotModule } from './modules/bot/bot.module';
import { LandingModule } from './modules/landing/landing.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate,
      cache: true,
    }),
    ThrottlerModule.forRoot([
      {
        ttl: 60000,
        limit: 30,
      },
    ]),
    ScheduleModule.forRoot(),
    TelegrafModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        token: configService.get<string>('TELEGRAM_BOT_TOKEN') ?? '',
      }),
    }),

    // Feature Modules
    DatabaseModule,
    MetrikaModule,
    PaymentsModule,
    PostbackModule,
    AttributionModule,
    BotModule,
    LandingModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
