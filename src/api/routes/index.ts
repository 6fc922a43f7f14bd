import { Router } from 'express';

import { config } from '@config/env.config.js';

import { createDevAvailabilityRouter } from './dev.availability.routes.js';
import webhookRoutes from './webhook.routes.js';

export function createApiRouter(nodeEnv: string = config.NODE_ENV): Router {
  const v1Router = Router();
  v1Router.use('/webhook', webhookRoutes);
  if (nodeEnv !== 'production') {
    v1Router.use(createDevAvailabilityRouter());
  }

  const router = Router();
  router.use('/v1', v1Router);
  return router;
}

export default createApiRouter();
