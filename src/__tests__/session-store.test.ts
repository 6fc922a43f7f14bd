import { beforeEach, describe, expect, it, vi } from 'vitest';

import { MemorySessionStore } from '@services/conversation/session-store.js';
import { RedisSessionStore } from '@services/conversation/state.store.js';
import type { ConversationRecord } from '@services/conversation/state.types.js';

const redisMock = vi.hoisted(() => ({
  get: vi.fn(),
  set: vi.fn(),
  del: vi.fn(),
}));

vi.mock('@infra/redis/redis.client.js', () => ({ redis: redisMock }));

const record: ConversationRecord = {
  session: { step: 'AWAITING_NAME', serviceType: 'appointment_1' },
  buttonMap: { '1': 'date_1' },
  updatedAt: '2030-06-03T15:00:00.000Z',
};

describe('MemorySessionStore', () => {
  it('expires a record ttl seconds after its last write', async () => {
    let now = 0;
    const store = new MemorySessionStore(10, () => now);
    await store.put('5541', record);

    now = 9_999;
    expect(await store.get('5541')).toEqual(record);

    now = 10_000;
    expect(await store.get('5541')).toBeNull();
  });

  it('refuses a ttl that would expire records on write', () => {
    expect(() => new MemorySessionStore(0)).toThrow(RangeError);
  });

  it('expires each caller on its own schedule between sweeps', async () => {
    let now = 0;
    const store = new MemorySessionStore(10, () => now);
    await store.put('a', record);
    now = 5_000;
    await store.put('b', record);

    now = 12_000;

    expect(await store.get('a')).toBeNull();
    expect(await store.get('b')).toEqual(record);
  });

  it('slides the expiry on every write', async () => {
    let now = 0;
    const store = new MemorySessionStore(10, () => now);
    await store.put('5541', record);

    now = 8_000;
    await store.put('5541', record);
    now = 15_000;

    expect(await store.get('5541')).toEqual(record);
  });

  it('keeps callers apart and deletes one', async () => {
    const store = new MemorySessionStore(60);
    await store.put('a', record);
    await store.put('b', { ...record, session: { step: 'MENU' } });

    await store.delete('a');

    expect(await store.get('a')).toBeNull();
    expect((await store.get('b'))?.session.step).toBe('MENU');
  });
});

describe('RedisSessionStore', () => {
  beforeEach(() => {
    redisMock.get.mockReset();
    redisMock.set.mockReset();
    redisMock.del.mockReset();
  });

  it('writes the record under the caller key with an expiry', async () => {
    const store = new RedisSessionStore(1800);

    await store.put('5541', record);

    expect(redisMock.set).toHaveBeenCalledWith('conv:5541', JSON.stringify(record), { EX: 1800 });
  });

  it('reads back a stored record', async () => {
    redisMock.get.mockResolvedValue(JSON.stringify(record));
    const store = new RedisSessionStore(1800);

    expect(await store.get('5541')).toEqual(record);
    expect(redisMock.get).toHaveBeenCalledWith('conv:5541');
  });

  it('treats unreadable or foreign data as no session', async () => {
    const store = new RedisSessionStore(1800);

    redisMock.get.mockResolvedValueOnce('{not json');
    expect(await store.get('5541')).toBeNull();

    redisMock.get.mockResolvedValueOnce(JSON.stringify({ session: { step: 'PAYMENT' }, updatedAt: 'x' }));
    expect(await store.get('5541')).toBeNull();

    redisMock.get.mockResolvedValueOnce(null);
    expect(await store.get('5541')).toBeNull();
  });

  it('defaults to the configured session ttl', async () => {
    await new RedisSessionStore().put('5541', record);

    expect(redisMock.set).toHaveBeenCalledWith('conv:5541', JSON.stringify(record), { EX: 1800 });
  });

  it('refuses a ttl without expiry', () => {
    expect(() => new RedisSessionStore(0)).toThrow(RangeError);
  });

  it('deletes the caller key', async () => {
    const store = new RedisSessionStore(1800);

    await store.delete('5541');

    expect(redisMock.del).toHaveBeenCalledWith('conv:5541');
  });
});
