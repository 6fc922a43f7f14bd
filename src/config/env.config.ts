import 'dotenv/config';
import { z } from 'zod';

const LogLevel = z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly', 'silent']);

const toNumber = (fallback: number) =>
  z.preprocess((v) => (v === undefined || v === '' ? fallback : Number(v)), z.number());

const toHour = (fallback: number) => toNumber(fallback).pipe(z.number().int().min(0).max(23));

const toBool = (fallback: boolean) =>
  z.preprocess((v) => {
    if (v === undefined || v === '') return fallback;
    if (typeof v === 'boolean') return v;
    const s = String(v).toLowerCase().trim();
    return ['1', 'true', 'yes', 'y', 'on'].includes(s);
  }, z.boolean());

export const ConfigSchema = z
  .object({
    NODE_ENV: z.string().default('development'),
    PORT: toNumber(3000),
    LOG_LEVEL: LogLevel.default('info'),

    SESSION_STORE: z.enum(['memory', 'redis']).default('memory'),
    SESSION_TTL: toNumber(1800).pipe(z.number().int().positive()),
    REDIS_URL: z.string().optional(),

    QUEUE_ENABLED: toBool(false),
    QUEUE_CONCURRENCY: toNumber(5),

    WHATSAPP_VERIFY_TOKEN: z.string().optional(),
    WHATSAPP_PHONE_NUMBER_ID: z.string().optional(),
    WHATSAPP_ACCESS_TOKEN: z.string().optional(),
    WHATSAPP_APP_SECRET: z.string().optional(),
    WHATSAPP_SEND_RETRIES: toNumber(3),

    GOOGLE_CALENDAR_ID: z.string().default('primary'),
    GOOGLE_CREDENTIALS_FILE: z.string().optional(),

    TIMEZONE: z.string().default('America/Sao_Paulo'),
    SLOT_DURATION_MINUTES: toNumber(30).pipe(z.number().int().positive()),
    WORK_START_HOUR: toHour(9),
    WORK_END_HOUR: toHour(17),
    BOOKING_HORIZON_DAYS: toNumber(14).pipe(z.number().int().positive()),

    CLINIC_NAME: z.string().default('Clínica Dr. Silva'),
    CLINIC_PHONE: z.string().default('(41) 3333-4444'),
  })
  .superRefine((cfg, ctx) => {
    if ((cfg.SESSION_STORE === 'redis' || cfg.QUEUE_ENABLED) && !cfg.REDIS_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['REDIS_URL'],
        message: 'REDIS_URL is required when SESSION_STORE=redis or QUEUE_ENABLED=true',
      });
    }
    if (cfg.WORK_START_HOUR >= cfg.WORK_END_HOUR) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['WORK_END_HOUR'],
        message: 'WORK_END_HOUR must be after WORK_START_HOUR',
      });
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

function loadEnv(): Readonly<AppConfig> {
  const parsed = ConfigSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
    const message = [
      'Invalid environment configuration:',
      issues,
      'Update your .env or environment variables and try again.',
    ].join('\n');
    throw new Error(message);
  }
  return Object.freeze(parsed.data);
}

export const config: Readonly<AppConfig> = loadEnv();
