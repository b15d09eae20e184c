import type Redis from 'ioredis';
import { StoreUnavailableError } from '../../domain/errors';
import type { EphemeralStore } from '../../repositories/ephemeralStore';

// INCR and PEXPIRE in one round trip so a counter can never be left without a TTL.
const INCREMENT_WITH_TTL = `local count = redis.call('INCR', KEYS[1])
if count == 1 then
  redis.call('PEXPIRE', KEYS[1], ARGV[1])
end
return count`;

const toTtl = (ttlMs: number) => {
  if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
    throw new RangeError(`ttl must be positive, received ${ttlMs}`);
  }
  return Math.ceil(ttlMs);
};

export const createRedisEphemeralStore = (redis: Redis): EphemeralStore => {
  const guard = async <T>(command: string, run: () => Promise<T>): Promise<T> => {
    try {
      return await run();
    } catch (error) {
      throw new StoreUnavailableError(`redis ${command} failed`, error);
    }
  };

  return {
    async get(key) {
      return guard('GET', () => redis.get(key));
    },
    async set(key, value, ttlMs) {
      const ttl = toTtl(ttlMs);
      await guard('SET', () => redis.set(key, value, 'PX', ttl));
    },
    async incrementWithTtl(key, ttlMs) {
      const ttl = toTtl(ttlMs);
      const count = await guard('EVAL', () => redis.eval(INCREMENT_WITH_TTL, 1, key, ttl));
      return Number(count);
    },
    async delete(key) {
      const removed = await guard('DEL', () => redis.del(key));
      return removed === 1;
    }
  };
};
