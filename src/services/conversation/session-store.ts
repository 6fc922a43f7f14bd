import type { ConversationRecord } from './state.types.js';

export interface SessionStore {
  get(callerId: string): Promise<ConversationRecord | null>;
  put(callerId: string, record: ConversationRecord): Promise<void>;
  delete(callerId: string): Promise<void>;
}

interface Entry {
  record: ConversationRecord;
  expiresAt: number;
}

const SWEEP_INTERVAL_MS = 60_000;

/**
 * Process-local store. Entries expire `ttlSeconds` after their last write;
 * expired entries of other callers are swept at most once a minute.
 */
export class MemorySessionStore implements SessionStore {
  private readonly map = new Map<string, Entry>();
  private lastSweep = 0;

  constructor(
    private readonly ttlSeconds: number,
    private readonly now: () => number = Date.now,
  ) {
    if (!(ttlSeconds > 0)) throw new RangeError('ttlSeconds must be positive');
  }

  private sweep(now: number): void {
    if (now - this.lastSweep < SWEEP_INTERVAL_MS) return;
    this.lastSweep = now;
    for (const [key, entry] of this.map.entries()) {
      if (entry.expiresAt <= now) {
        this.map.delete(key);
      }
    }
  }

  async get(callerId: string): Promise<ConversationRecord | null> {
    const now = this.now();
    this.sweep(now);
    const entry = this.map.get(callerId);
    if (!entry) return null;
    if (entry.expiresAt <= now) {
      this.map.delete(callerId);
      return null;
    }
    return entry.record;
  }

  async put(callerId: string, record: ConversationRecord): Promise<void> {
    const now = this.now();
    this.sweep(now);
    this.map.set(callerId, { record, expiresAt: now + this.ttlSeconds * 1000 });
  }

  async delete(callerId: string): Promise<void> {
    this.map.delete(callerId);
  }
}
