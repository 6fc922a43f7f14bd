import { createClient } from 'redis';

import { errorMeta, logger } from '@utils/logger.js';

import { config } from '../../config/env.config.js';

export type RedisClient = ReturnType<typeof createClient>;

export const redis: RedisClient = createClient({
  url: config.REDIS_URL,
});

redis.on('error', (err: Error) => {
  logger.error('[redis] error', { error: err.message });
});

redis.on('connect', () => {
  logger.info('[redis] connected');
});

redis.on('end', () => {
  logger.info('[redis] connection closed');
});

export async function connectRedis(): Promise<void> {
  if (!redis.isOpen) {
    await redis.connect();
  }
}

export async function disconnectRedis(): Promise<void> {
  if (redis.isOpen) {
    await redis.quit();
  }
}

/** `beforeClose` runs first, for consumers that must stop before the connection goes. */
export function registerRedisShutdownSignals(beforeClose?: () => Promise<void>): void {
  const handler = (signal: NodeJS.Signals) => {
    logger.info(`[redis] received ${signal}, closing...`);
    Promise.resolve(beforeClose?.())
      .then(() => disconnectRedis())
      .catch((err: unknown) => {
        logger.error('[redis] error while closing', errorMeta(err));
      })
      .finally(() => process.exit(0));
  };
  process.once('SIGINT', handler);
  process.once('SIGTERM', handler);
}
