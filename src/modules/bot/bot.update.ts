import { Inject, Logger } from '@nestjs/common';
import { Ctx, Start, Update } from 'nestjs-telegraf';
import { Context } from 'telegraf';
import { AttributionStoreService } from '../attribution/attribution-store.service';
import { METRIKA_CONFIG, MetrikaConfig } from '../metrika/metrika.types';
import { PostbackService } from '../postback/postback.service';
import { BotService } from './bot.service';
import { parseStartPayload } from './start-payload';

export const WELCOME_MESSAGE =
  '👋 Welcome! Use the menu below to pick a subscription.';

export function extractStartPayload(text: string | undefined): string {
  const [, payload = ''] = String(text ?? '').trim().split(/\s+/, 2);
  return payload;
}

@Update()
export class BotUpdate {
  private readonly logger = new Logger(BotUpdate.name);

  constructor(
    private readonly botService: BotService,
    private readonly store: AttributionStoreService,
    private readonly postbackService: PostbackService,
    @Inject(METRIKA_CONFIG) private readonly metrikaConfig: MetrikaConfig,
  ) {}

  @Start()
  async onStart(@Ctx() ctx: Context) {
    await this.botService.registerSubscriber(ctx.from);

    const userId = this.botService.normalizeTelegramId(ctx.from);
    const text =
      ctx.message && 'text' in ctx.message ? ctx.message.text : undefined;
    const attribution = parseStartPayload(extractStartPayload(text));

    if (userId) {
      await this.captureAttribution(userId, attribution.clientId, attribution.subId);
    }

    await ctx.reply(WELCOME_MESSAGE);
  }

  private async captureAttribution(
    userId: string,
    clientId: string | null,
    subId: string | null,
  ) {
    if (clientId) {
      try {
        await this.store.upsertTracking(
          userId,
          clientId,
          this.metrikaConfig.counterId,
        );
      } catch (error) {
        this.logger.error(
          `Failed to record tracking for user ${userId}`,
          error as Error,
        );
      }
    }

    if (subId) {
      const isNew = await this.botService.rememberSourceSubId(userId, subId);
      if (isNew) {
        await this.postbackService.sendInstall(subId);
      }
    }
  }
}
