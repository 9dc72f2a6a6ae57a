import { ConfigService } from '@nestjs/config';

export function normalizeNumber(
  value: unknown,
  fallback: number,
  min: number,
  max: number,
): number {
  const parsed =
    typeof value === 'number' ? value : Number.parseFloat(String(value ?? ''));
  if (!Number.isFinite(parsed)) {
    return fallback;
  }
  return Math.min(Math.max(parsed, min), max);
}

export function readBoundedNumber(
  configService: ConfigService,
  key: string,
  fallback: number,
  min: number,
  max: number,
): number {
  return normalizeNumber(configService.get<unknown>(key), fallback, min, max);
}
