import type { EphemeralStore } from '../../repositories/ephemeralStore';

interface Entry {
  value: string;
  expiresAt: number;
}

export interface MemoryEphemeralStoreOptions {
  now?: () => number;
  /** Minimum gap between full sweeps of expired entries, run on writes. */
  sweepIntervalMs?: number;
}

export interface MemoryEphemeralStore extends EphemeralStore {
  /** Entries currently held, expired or not. */
  size(): number;
}

export const createMemoryEphemeralStore = ({
  now = () => Date.now(),
  sweepIntervalMs = 60_000
}: MemoryEphemeralStoreOptions = {}): MemoryEphemeralStore => {
  const store = new Map<string, Entry>();
  let lastSweep = now();

  // Keys that are written once and never read again would otherwise stay forever.
  const sweep = () => {
    const current = now();
    if (current - lastSweep < sweepIntervalMs) return;
    lastSweep = current;
    for (const [key, entry] of store) {
      if (entry.expiresAt <= current) {
        store.delete(key);
      }
    }
  };

  const live = (key: string) => {
    const entry = store.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= now()) {
      store.delete(key);
      return undefined;
    }
    return entry;
  };

  const assertTtl = (ttlMs: number) => {
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new RangeError(`ttl must be positive, received ${ttlMs}`);
    }
  };

  return {
    async get(key) {
      return live(key)?.value ?? null;
    },
    async set(key, value, ttlMs) {
      assertTtl(ttlMs);
      sweep();
      store.set(key, { value, expiresAt: now() + ttlMs });
    },
    async incrementWithTtl(key, ttlMs) {
      assertTtl(ttlMs);
      sweep();
      const entry = live(key);
      if (!entry) {
        store.set(key, { value: '1', expiresAt: now() + ttlMs });
        return 1;
      }
      const next = Number.parseInt(entry.value, 10) + 1;
      store.set(key, { value: String(next), expiresAt: entry.expiresAt });
      return next;
    },
    async delete(key) {
      const existed = live(key) !== undefined;
      store.delete(key);
      return existed;
    },
    size() {
      return store.size;
    }
  };
};
