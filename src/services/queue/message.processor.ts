import {
  getConversationService,
  type ConversationService,
  type InboundMessage,
} from '@services/conversation/index.js';
import { WhatsAppService } from '@services/messaging/whatsapp.service.js';
import { logger } from '@utils/logger.js';

import { getMessageDedup, type MessageDedup } from './message.dedup.js';

export class MessageProcessor {
  constructor(
    private readonly conversation: Pick<ConversationService, 'handleInbound'> = getConversationService(),
    private readonly whatsapp: Pick<WhatsAppService, 'sendResponse'> = new WhatsAppService(),
    private readonly dedup: MessageDedup = getMessageDedup(),
  ) {}

  /** Applies the caller's turn once, then delivers the reply. */
  async processMessage(msg: InboundMessage): Promise<void> {
    if (!(await this.dedup.claim(msg.messageId))) {
      logger.debug('[processor] duplicate delivery ignored', { messageId: msg.messageId });
      return;
    }
    const response = await this.conversation.handleInbound(msg);
    await this.whatsapp.sendResponse(msg.callerId, response);
  }
}
