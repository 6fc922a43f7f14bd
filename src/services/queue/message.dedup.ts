import { config } from '@config/env.config.js';
import { redis } from '@infra/redis/redis.client.js';
import { redisConfig } from '@infra/redis/redis.config.js';

const DEDUP_TTL_SEC = 60 * 60 * 24;
const SWEEP_INTERVAL_MS = 60_000;

/** Drops repeated webhook deliveries of the same WhatsApp message. */
export interface MessageDedup {
  /** True the first time a message id is seen within the retention window. */
  claim(messageId: string): Promise<boolean>;
}

export class MemoryMessageDedup implements MessageDedup {
  private readonly seen = new Map<string, number>();
  private lastSweep = 0;

  constructor(
    private readonly ttlMs = DEDUP_TTL_SEC * 1000,
    private readonly now: () => number = Date.now,
  ) {}

  async claim(messageId: string): Promise<boolean> {
    const now = this.now();
    if (now - this.lastSweep >= SWEEP_INTERVAL_MS) {
      this.lastSweep = now;
      for (const [id, expiresAt] of this.seen.entries()) {
        if (expiresAt <= now) this.seen.delete(id);
      }
    }
    const expiresAt = this.seen.get(messageId);
    if (expiresAt !== undefined && expiresAt > now) return false;
    this.seen.set(messageId, now + this.ttlMs);
    return true;
  }
}

export class RedisMessageDedup implements MessageDedup {
  async claim(messageId: string): Promise<boolean> {
    const key = `${redisConfig.prefixes.dedup}:${messageId}`;
    const set = await redis.set(key, '1', { NX: true, EX: DEDUP_TTL_SEC });
    return set === 'OK';
  }
}

let instance: MessageDedup | null = null;

export function getMessageDedup(): MessageDedup {
  if (!instance) {
    instance = config.QUEUE_ENABLED ? new RedisMessageDedup() : new MemoryMessageDedup();
  }
  return instance;
}
