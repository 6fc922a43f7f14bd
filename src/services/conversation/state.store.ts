import { z } from 'zod';

import { redis } from '@infra/redis/redis.client.js';
import { redisConfig } from '@infra/redis/redis.config.js';

import type { SessionStore } from './session-store.js';
import { SERVICE_TYPES, STEPS, type ConversationRecord } from './state.types.js';

const IndexedChoicesSchema = z.record(z.string(), z.string());

const ConversationRecordSchema = z.object({
  session: z.object({
    step: z.enum(STEPS),
    serviceType: z.enum(SERVICE_TYPES).optional(),
    patientName: z.string().optional(),
    offeredDates: IndexedChoicesSchema.optional(),
    offeredTimes: IndexedChoicesSchema.optional(),
    selectedDate: z.string().optional(),
    selectedTime: z.string().optional(),
  }),
  buttonMap: IndexedChoicesSchema.optional(),
  updatedAt: z.string(),
});

function keyFor(callerId: string): string {
  return `${redisConfig.prefixes.conversation}:${callerId.trim()}`;
}

function safeParse(raw: string | null): ConversationRecord | null {
  if (!raw) return null;
  try {
    const parsed = ConversationRecordSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/** Redis-backed store; every write refreshes the key's expiry. */
export class RedisSessionStore implements SessionStore {
  constructor(private readonly ttlSeconds = redisConfig.ttlSeconds) {
    if (!(ttlSeconds > 0)) throw new RangeError('ttlSeconds must be positive');
  }

  async get(callerId: string): Promise<ConversationRecord | null> {
    const raw = await redis.get(keyFor(callerId));
    return safeParse(raw);
  }

  async put(callerId: string, record: ConversationRecord): Promise<void> {
    await redis.set(keyFor(callerId), JSON.stringify(record), { EX: this.ttlSeconds });
  }

  async delete(callerId: string): Promise<void> {
    await redis.del(keyFor(callerId));
  }
}
