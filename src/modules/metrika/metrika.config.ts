import { ConfigService } from '@nestjs/config';
import { readBoundedNumber } from '../../common/config-number';
import { MetrikaConfig } from './metrika.types';

export const DEFAULT_COLLECT_URL = 'https://mc.yandex.ru/collect';
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export function buildMetrikaConfig(configService: ConfigService): MetrikaConfig {
  const counterId =
    configService.get<string>('METRIKA_COUNTER_ID')?.trim() || null;
  const measurementToken =
    configService.get<string>('METRIKA_MEASUREMENT_TOKEN')?.trim() || null;

  return {
    counterId,
    measurementToken,
    collectUrl:
      configService.get<string>('METRIKA_COLLECT_URL') ?? DEFAULT_COLLECT_URL,
    requestTimeoutMs: readBoundedNumber(
      configService,
      'METRIKA_REQUEST_TIMEOUT_MS',
      DEFAULT_REQUEST_TIMEOUT_MS,
      1_000,
      30_000,
    ),
    botUsername: (
      configService.get<string>('TELEGRAM_BOT_USERNAME') ?? 'your_bot'
    ).replace(/^@/, ''),
    currency: (configService.get<string>('METRIKA_CURRENCY') ?? 'RUB').toUpperCase(),
    brand: configService.get<string>('METRIKA_BRAND') ?? 'Subscription Service',
  };
}

export function isMetrikaConfigured(config: MetrikaConfig): boolean {
  return Boolean(config.counterId && config.measurementToken);
}
