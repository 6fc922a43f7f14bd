import crypto from 'crypto';

import type { Request } from 'express';

import { config } from '@config/env.config.js';
import { ConfigurationError } from '@core/errors/configuration.error.js';

export function computeSignature(body: Buffer, secret: string): string {
  return 'sha256=' + crypto.createHmac('sha256', secret).update(body).digest('hex');
}

export function verifySignature(req: Request, secret = config.WHATSAPP_APP_SECRET): boolean {
  const signature = req.headers['x-hub-signature-256'];
  if (typeof signature !== 'string' || !req.rawBody) return false;
  if (!secret) {
    throw new ConfigurationError('WHATSAPP_APP_SECRET is not configured');
  }
  const received = Buffer.from(signature);
  const expected = Buffer.from(computeSignature(req.rawBody, secret));
  if (received.length !== expected.length) return false;
  return crypto.timingSafeEqual(received, expected);
}
