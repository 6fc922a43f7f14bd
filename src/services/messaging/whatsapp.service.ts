import { config } from '@config/env.config.js';
import { withRetry, type RetryOptions } from '@infra/whatsapp/send.retry.js';
import { sendWhatsAppMessage } from '@infra/whatsapp/whatsapp.client.js';
import type { OutboundResponse } from '@services/conversation/state.types.js';
import { errorMeta, logger } from '@utils/logger.js';

import { buildWhatsAppPayload, type WhatsAppPayload } from './whatsapp.payload.js';

export class WhatsAppService {
  constructor(
    private readonly send: (payload: WhatsAppPayload) => Promise<unknown> = sendWhatsAppMessage,
    private readonly retry: RetryOptions = { retries: config.WHATSAPP_SEND_RETRIES },
  ) {}

  async sendResponse(to: string, response: OutboundResponse): Promise<void> {
    const payload = buildWhatsAppPayload(to, response);
    try {
      await withRetry(() => this.send(payload), this.retry);
      logger.info('[whatsapp] message sent', { to, type: payload.type });
    } catch (err) {
      logger.error('[whatsapp] send error', { to, ...errorMeta(err) });
      throw err;
    }
  }
}
