import { MAX_OPTIONS } from '@services/booking/config.defaults.js';
import { messages } from '@services/conversation/messages.js';
import type { OptionItem, OutboundResponse } from '@services/conversation/state.types.js';

/** Cloud API limits for reply-button messages. */
const BUTTON_TITLE_MAX = 20;
const BODY_MAX = 1024;

export interface WhatsAppTextPayload {
  messaging_product: 'whatsapp';
  recipient_type: 'individual';
  to: string;
  type: 'text';
  text: { body: string; preview_url: boolean };
}

export interface WhatsAppButtonPayload {
  messaging_product: 'whatsapp';
  recipient_type: 'individual';
  to: string;
  type: 'interactive';
  interactive: {
    type: 'button';
    body: { text: string };
    action: {
      buttons: Array<{ type: 'reply'; reply: { id: string; title: string } }>;
    };
  };
}

export type WhatsAppPayload = WhatsAppTextPayload | WhatsAppButtonPayload;

function truncate(value: string, max: number): string {
  return value.length <= max ? value : `${value.slice(0, max - 1)}…`;
}

/**
 * Numbered list under the prompt, so clients that cannot show buttons can
 * answer with the option number.
 */
export function renderOptionsBody(body: string, options: readonly OptionItem[]): string {
  const lines = options.slice(0, MAX_OPTIONS).map((o, i) => `${i + 1}. ${o.label}`);
  return `${body}\n\n${lines.join('\n')}\n\n${messages.optionsHint()}`;
}

export function buildWhatsAppPayload(to: string, response: OutboundResponse): WhatsAppPayload {
  switch (response.type) {
    case 'TEXT':
      return {
        messaging_product: 'whatsapp',
        recipient_type: 'individual',
        to,
        type: 'text',
        text: { body: response.body, preview_url: false },
      };
    case 'OPTIONS':
      return {
        messaging_product: 'whatsapp',
        recipient_type: 'individual',
        to,
        type: 'interactive',
        interactive: {
          type: 'button',
          body: { text: truncate(renderOptionsBody(response.body, response.options), BODY_MAX) },
          action: {
            buttons: response.options.slice(0, MAX_OPTIONS).map((o) => ({
              type: 'reply' as const,
              reply: { id: o.id, title: truncate(o.label, BUTTON_TITLE_MAX) },
            })),
          },
        },
      };
  }
}
