import { describe, expect, it } from 'vitest';
import { createMemoryEphemeralStore } from '../../../../adapters/inMemory/ephemeralStore';

describe('memory ephemeral store', () => {
  it('expires values after their ttl', async () => {
    let current = 1_000;
    const store = createMemoryEphemeralStore({ now: () => current });
    await store.set('k', 'v', 500);
    expect(await store.get('k')).toBe('v');
    current = 1_500;
    expect(await store.get('k')).toBeNull();
  });

  it('applies the ttl only on the first increment', async () => {
    let current = 0;
    const store = createMemoryEphemeralStore({ now: () => current });
    expect(await store.incrementWithTtl('counter', 1_000)).toBe(1);
    current = 900;
    expect(await store.incrementWithTtl('counter', 1_000)).toBe(2);
    current = 1_000;
    expect(await store.get('counter')).toBeNull();
    expect(await store.incrementWithTtl('counter', 1_000)).toBe(1);
  });

  it('reports whether delete removed a live key', async () => {
    const store = createMemoryEphemeralStore();
    await store.set('k', 'v', 10_000);
    expect(await store.delete('k')).toBe(true);
    expect(await store.delete('k')).toBe(false);
  });

  it('drops expired keys that are never read again once the sweep interval passes', async () => {
    let current = 0;
    const store = createMemoryEphemeralStore({ now: () => current, sweepIntervalMs: 10_000 });
    for (const jti of ['a', 'b', 'c']) {
      await store.set(`revoked:${jti}`, '1', 1_000);
    }
    await store.incrementWithTtl('lockout:ada@example.com', 60_000);

    current = 5_000;
    await store.set('revoked:d', '1', 1_000);
    expect(store.size()).toBe(5);

    current = 10_000;
    await store.set('revoked:e', '1', 1_000);
    expect(store.size()).toBe(2);
    expect(await store.get('lockout:ada@example.com')).toBe('1');
  });

  it('rejects non-positive ttls', async () => {
    const store = createMemoryEphemeralStore();
    await expect(store.set('k', 'v', 0)).rejects.toBeInstanceOf(RangeError);
    await expect(store.incrementWithTtl('k', -5)).rejects.toBeInstanceOf(RangeError);
  });
});
