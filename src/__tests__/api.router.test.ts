import request from 'supertest';
import { describe, expect, it } from 'vitest';

import { createApiRouter } from '@api/routes/index.js';
import { buildTestApp } from '@test/utils/buildTestApp.js';

describe('createApiRouter', () => {
  it('leaves the dev routes out in production', async () => {
    const app = buildTestApp(createApiRouter('production'), '/');

    const dev = await request(app).get('/v1/dev/availability/dates');
    const webhook = await request(app).get('/v1/webhook').query({ 'hub.mode': 'subscribe' });

    expect(dev.status).toBe(404);
    expect(webhook.status).toBe(403);
  });
});
