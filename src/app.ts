import cors from 'cors';
import express, { type Express, type Request, type Response } from 'express';
import helmet from 'helmet';

import { config } from '@config/env.config.js';
import { connectRedis, registerRedisShutdownSignals } from '@infra/redis/redis.client.js';
import { startQueue, stopQueue } from '@services/queue/queue.manager.js';
import { errorMeta, logger } from '@utils/logger.js';

import { apiRouter } from './api/index.js';
import { errorMiddleware } from './middleware/index.js';

export function createApp(): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' });
  });

  // The webhook route parses its own raw body for signature checks.
  app.use('/', apiRouter);
  app.use(errorMiddleware);
  return app;
}

async function bootstrap(): Promise<void> {
  const needsRedis = config.SESSION_STORE === 'redis' || config.QUEUE_ENABLED;
  if (needsRedis) {
    await connectRedis();
    registerRedisShutdownSignals(config.QUEUE_ENABLED ? stopQueue : undefined);
  }
  if (config.QUEUE_ENABLED) {
    startQueue();
    logger.info('[queue] worker started', { concurrency: config.QUEUE_CONCURRENCY });
  }

  const app = createApp();
  app.listen(config.PORT, () => {
    logger.info(`${config.CLINIC_NAME} receptionist listening`, {
      port: config.PORT,
      sessionStore: config.SESSION_STORE,
      queue: config.QUEUE_ENABLED,
    });
  });
}

if (config.NODE_ENV !== 'test') {
  bootstrap().catch((err: unknown) => {
    logger.error('Fatal bootstrap error', errorMeta(err));
    process.exit(1);
  });
}
