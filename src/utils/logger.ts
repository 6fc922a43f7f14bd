import winston from 'winston';

import { config } from '@config/env.config.js';

const isProduction = config.NODE_ENV === 'production';

export const logger = winston.createLogger({
  level: config.LOG_LEVEL === 'silent' ? 'error' : config.LOG_LEVEL,
  silent: config.LOG_LEVEL === 'silent',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    isProduction
      ? winston.format.json()
      : winston.format.combine(winston.format.colorize(), winston.format.simple()),
  ),
  defaultMeta: { service: 'clinic-receptionist' },
  transports: [new winston.transports.Console()],
});

export function errorMeta(err: unknown): { error: string; stack?: string } {
  if (err instanceof Error) return { error: err.message, stack: err.stack };
  return { error: String(err) };
}
