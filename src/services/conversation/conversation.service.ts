import { config } from '@config/env.config.js';
import { KeyedLock } from '@utils/locks.js';
import { errorMeta, logger } from '@utils/logger.js';

import { messages } from './messages.js';
import { MemorySessionStore, type SessionStore } from './session-store.js';
import { DialogueStateMachine } from './state-machine.js';
import { RedisSessionStore } from './state.store.js';
import type {
  ButtonIndexMap,
  InboundMessage,
  OutboundResponse,
} from './state.types.js';

const DIGITS = /^\d+$/;

/**
 * Structured ids from the channel take precedence. A bare numeral is looked
 * up in the map recorded with the previous prompt.
 */
export function resolveOptionId(
  msg: Pick<InboundMessage, 'text' | 'structuredOptionId'>,
  buttonMap?: ButtonIndexMap,
): string | undefined {
  if (msg.structuredOptionId) return msg.structuredOptionId;
  const numeral = msg.text.trim();
  if (!DIGITS.test(numeral) || !buttonMap || !Object.hasOwn(buttonMap, numeral)) return undefined;
  return buttonMap[numeral];
}

export function buildButtonMap(response: OutboundResponse): ButtonIndexMap | undefined {
  if (response.type !== 'OPTIONS') return undefined;
  return Object.fromEntries(response.options.map((o, i) => [String(i + 1), o.id]));
}

export function createSessionStore(): SessionStore {
  return config.SESSION_STORE === 'redis'
    ? new RedisSessionStore(config.SESSION_TTL)
    : new MemorySessionStore(config.SESSION_TTL);
}

export class ConversationService {
  constructor(
    private readonly machine = new DialogueStateMachine(),
    private readonly store: SessionStore = createSessionStore(),
    private readonly locks = new KeyedLock(),
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** Handles one caller turn. Never throws: faults become a generic reply. */
  async handleInbound(msg: InboundMessage): Promise<OutboundResponse> {
    try {
      return await this.locks.run(msg.callerId, () => this.processTurn(msg));
    } catch (err) {
      logger.error('[conversation] failed to process message', {
        callerId: msg.callerId,
        messageId: msg.messageId,
        ...errorMeta(err),
      });
      return { type: 'TEXT', body: messages.genericError() };
    }
  }

  private async processTurn(msg: InboundMessage): Promise<OutboundResponse> {
    const record = await this.store.get(msg.callerId);
    const session = record?.session ?? this.machine.newSession();

    const { session: next, response, warnings } = await this.machine.transition(session, {
      callerId: msg.callerId,
      text: msg.text,
      resolvedOptionId: resolveOptionId(msg, record?.buttonMap),
    });

    if (warnings.length) {
      logger.warn('[conversation] invariant warnings', { callerId: msg.callerId, warnings });
    }

    // The map is consumed by this turn; only a fresh options prompt replaces it.
    await this.store.put(msg.callerId, {
      session: next,
      buttonMap: buildButtonMap(response),
      updatedAt: this.now().toISOString(),
    });

    logger.debug('[conversation] turn processed', {
      callerId: msg.callerId,
      from: session.step,
      to: next.step,
      response: response.type,
    });
    return response;
  }
}

let instance: ConversationService | null = null;

/** Process-wide service, so every inbound turn shares one store and lock table. */
export function getConversationService(): ConversationService {
  if (!instance) {
    instance = new ConversationService();
  }
  return instance;
}
