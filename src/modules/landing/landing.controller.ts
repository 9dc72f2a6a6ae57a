import {
  Controller,
  Get,
  Inject,
  Logger,
  Query,
  Redirect,
  UseGuards,
} from '@nestjs/common';
import { ThrottlerBehindProxyGuard } from '../../common/guards/throttler-behind-proxy.guard';
import { validateClientId } from '../metrika/client-id';
import { METRIKA_CONFIG, MetrikaConfig } from '../metrika/metrika.types';
import { buildStartPayload } from '../bot/start-payload';
import { ClickQueryDto } from './dto/click-query.dto';

@Controller()
export class LandingController {
  private readonly logger = new Logger(LandingController.name);

  constructor(
    @Inject(METRIKA_CONFIG) private readonly metrikaConfig: MetrikaConfig,
  ) {}

  /** Forwards an ad click to the bot, carrying the click id in /start. */
  @Get('go')
  @UseGuards(ThrottlerBehindProxyGuard)
  @Redirect()
  click(@Query() query: ClickQueryDto) {
    const clientId = (query.yclid ?? query.client_id ?? '').trim() || null;
    if (clientId && !validateClientId(clientId)) {
      this.logger.warn(`Ignoring malformed client id on click: ${clientId}`);
    }

    const payload = buildStartPayload({
      clientId,
      subId: query.subid?.trim() || null,
    });
    const botUrl = `https://t.me/${this.metrikaConfig.botUsername}`;
    return {
      url: payload ? `${botUrl}?start=${payload}` : botUrl,
      statusCode: 302,
    };
  }

  @Get('health')
  health() {
    return { status: 'healthy' };
  }
}
