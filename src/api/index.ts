export * from './controllers/webhook.controller.js';
export * from './controllers/webhook.schema.js';
export { createDevAvailabilityRouter } from './routes/dev.availability.routes.js';
export { default as webhookRoutes } from './routes/webhook.routes.js';
export { default as apiRouter, createApiRouter } from './routes/index.js';
