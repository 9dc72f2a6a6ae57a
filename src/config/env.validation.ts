import { z } from 'zod';

const optionalNumber = () => z.coerce.number().optional();

// z.coerce.boolean() reads "false" as true.
const optionalFlag = () =>
  z
    .union([z.boolean(), z.string()])
    .transform((value) =>
      typeof value === 'boolean'
        ? value
        : ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase()),
    )
    .optional();

export const envSchema = z.object({
  // Server
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  PORT: z.coerce.number().default(3000),
  CORS_ORIGINS: z.string().optional(),

  DB_HOST: z.string(),
  DB_PORT: z.coerce.number().default(3306),
  DB_USERNAME: z.string(),
  DB_PASSWORD: z.string(),
  DB_NAME: z.string(),
  DB_SYNC: optionalFlag(),
  RUN_MIGRATIONS: optionalFlag(),

  // Telegram
  TELEGRAM_BOT_TOKEN: z.string(),
  TELEGRAM_BOT_USERNAME: z.string().min(1),

  // Internal callers (payment processor, maintenance scripts)
  INTERNAL_API_TOKEN: z.string().min(10),

  // Yandex Metrika measurement protocol
  METRIKA_COUNTER_ID: z.string().optional(),
  METRIKA_MEASUREMENT_TOKEN: z.string().optional(),
  METRIKA_COLLECT_URL: z.string().url().optional(),
  METRIKA_REQUEST_TIMEOUT_MS: optionalNumber(),
  METRIKA_CURRENCY: z.string().length(3).optional(),
  METRIKA_BRAND: z.string().optional(),

  // Visit reconciliation and conversion chain
  VISIT_COMPLETION_HOURS: optionalNumber(),
  SESSION_TIMEOUT_MINUTES: optionalNumber(),
  CONVERSION_EVENT_SPACING_MS: optionalNumber(),
  RESEND_THROTTLE_MS: optionalNumber(),
  TRACKING_RETENTION_DAYS: z.coerce.number().int().positive().optional(),

  // Partner postbacks
  POSTBACK_URL: z.string().url().optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validate(config: Record<string, unknown>) {
  const parsed = envSchema.safeParse(config);
  if (!parsed.success) {
    console.error('❌ Invalid Environment Variables:', parsed.error.format());
    throw new Error('Invalid Environment Configuration');
  }
  return parsed.data;
}
