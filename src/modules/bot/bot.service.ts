import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { BotSubscriber } from './entities/bot-subscriber.entity';

export type TelegramSourceUser = {
  id?: number | string;
  username?: string;
  first_name?: string;
  last_name?: string;
};

@Injectable()
export class BotService {
  private readonly logger = new Logger(BotService.name);

  constructor(
    @InjectRepository(BotSubscriber)
    private readonly subscriberRepo: Repository<BotSubscriber>,
  ) {}

  normalizeTelegramId(from: TelegramSourceUser | null | undefined): string | null {
    const telegramIdRaw = from?.id;
    if (telegramIdRaw === undefined || telegramIdRaw === null) {
      return null;
    }
    const telegramId = String(telegramIdRaw).trim();
    return telegramId || null;
  }

  async registerSubscriber(from: TelegramSourceUser | null | undefined) {
    const telegramId = this.normalizeTelegramId(from);
    if (!telegramId) {
      return;
    }

    await this.subscriberRepo
      .createQueryBuilder()
      .insert()
      .into(BotSubscriber)
      .values({
        telegramId,
        username: from?.username ?? null,
        firstName: from?.first_name ?? null,
        lastName: from?.last_name ?? null,
        isActive: true,
        lastSeenAt: new Date(),
      })
      .orUpdate(
        ['username', 'firstName', 'lastName', 'isActive', 'lastSeenAt'],
        ['telegramId'],
      )
      .execute();
  }

  /**
   * Keeps the first partner sub-id a subscriber arrived with. Returns true
   * only when it was stored now, so the install postback fires once.
   */
  async rememberSourceSubId(telegramId: string, subId: string): Promise<boolean> {
    const result = await this.subscriberRepo
      .createQueryBuilder()
      .update(BotSubscriber)
      .set({ sourceSubId: subId })
      .where('telegramId = :telegramId', { telegramId })
      .andWhere('sourceSubId IS NULL')
      .execute();

    const stored = (result.affected ?? 0) > 0;
    if (stored) {
      this.logger.log(`Stored partner sub-id for subscriber ${telegramId}`);
    }
    return stored;
  }
}
