import { z } from 'zod';

import type { InboundMessage } from '@services/conversation/state.types.js';

const ReplySchema = z.object({ id: z.string(), title: z.string() });

const MessageSchema = z.object({
  from: z.string(),
  id: z.string(),
  type: z.string(),
  text: z.object({ body: z.string() }).optional(),
  interactive: z
    .object({
      type: z.string(),
      button_reply: ReplySchema.optional(),
      list_reply: ReplySchema.optional(),
    })
    .optional(),
  button: z.object({ text: z.string(), payload: z.string().optional() }).optional(),
});

export const WebhookPayloadSchema = z.object({
  object: z.string().optional(),
  entry: z
    .array(
      z.object({
        changes: z
          .array(
            z.object({
              value: z.object({ messages: z.array(MessageSchema).optional() }).passthrough(),
            }),
          )
          .default([]),
      }),
    )
    .default([]),
});

export type WebhookPayload = z.infer<typeof WebhookPayloadSchema>;
type WebhookMessage = z.infer<typeof MessageSchema>;

/** Maps one channel message to an inbound turn; unsupported kinds yield null. */
export function toInboundMessage(msg: WebhookMessage): InboundMessage | null {
  const base = { callerId: msg.from, messageId: msg.id };
  switch (msg.type) {
    case 'text':
      return msg.text ? { ...base, text: msg.text.body } : null;
    case 'interactive': {
      const reply = msg.interactive?.button_reply ?? msg.interactive?.list_reply;
      return reply ? { ...base, text: reply.title, structuredOptionId: reply.id } : null;
    }
    case 'button':
      if (!msg.button) return null;
      return msg.button.payload
        ? { ...base, text: msg.button.text, structuredOptionId: msg.button.payload }
        : { ...base, text: msg.button.text };
    default:
      return null;
  }
}

/** Inbound messages in delivery order. Status callbacks carry none. */
export function extractInboundMessages(payload: WebhookPayload): InboundMessage[] {
  const out: InboundMessage[] = [];
  for (const entry of payload.entry) {
    for (const change of entry.changes) {
      for (const msg of change.value.messages ?? []) {
        const inbound = toInboundMessage(msg);
        if (inbound) out.push(inbound);
      }
    }
  }
  return out;
}
