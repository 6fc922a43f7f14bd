import type { NextFunction, Request, RequestHandler, Response } from 'express';

import { config } from '@config/env.config.js';
import { ValidationError } from '@core/errors/validation.error.js';
import type { InboundMessage } from '@services/conversation/state.types.js';
import { dispatchInbound } from '@services/queue/queue.manager.js';
import { errorMeta, logger } from '@utils/logger.js';

import { extractInboundMessages, WebhookPayloadSchema } from './webhook.schema.js';
import { verifySignature } from './webhook.validator.js';

export const verifyHandler = (req: Request, res: Response): void => {
  const mode = req.query['hub.mode'];
  const token = req.query['hub.verify_token'];
  const challenge = req.query['hub.challenge'];
  if (mode === 'subscribe' && token === config.WHATSAPP_VERIFY_TOKEN && typeof challenge === 'string') {
    res.status(200).send(challenge);
  } else {
    res.sendStatus(403);
  }
};

function parseBody(raw: Buffer | undefined): unknown {
  if (!raw || raw.length === 0) return {};
  try {
    return JSON.parse(raw.toString('utf8'));
  } catch {
    throw new ValidationError('Malformed JSON body');
  }
}

export function createWebhookHandler(
  dispatch: (msg: InboundMessage) => Promise<void> = dispatchInbound,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      if (!verifySignature(req)) {
        res.sendStatus(401);
        return;
      }
      const parsed = WebhookPayloadSchema.safeParse(parseBody(req.rawBody));
      if (!parsed.success) {
        throw new ValidationError('Invalid webhook payload', parsed.error.flatten());
      }

      for (const msg of extractInboundMessages(parsed.data)) {
        dispatch(msg).catch((err: unknown) => {
          logger.error('[webhook] failed to dispatch message', {
            messageId: msg.messageId,
            ...errorMeta(err),
          });
        });
      }
      // Meta expects a fast 200; the turn completes asynchronously.
      res.sendStatus(200);
    } catch (err) {
      next(err);
    }
  };
}

export const webhookHandler = createWebhookHandler();
