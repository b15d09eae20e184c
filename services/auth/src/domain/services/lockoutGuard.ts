import type { EphemeralStore } from '../../repositories/ephemeralStore';

export interface LockoutPolicy {
  maxAttempts: number;
  windowSeconds: number;
}

/** Failure counter per identity and origin. The window starts at the first failure and is never extended. */
export const createLockoutGuard = (store: EphemeralStore, policy: LockoutPolicy) => {
  const keyFor = (identity: string, origin: string) => `lockout:${identity.trim().toLowerCase()}:${origin}`;

  const recordFailure = (key: string) => store.incrementWithTtl(key, policy.windowSeconds * 1000);

  const isLocked = async (key: string) => {
    const value = await store.get(key);
    return value !== null && Number(value) >= policy.maxAttempts;
  };

  const reset = async (key: string) => {
    await store.delete(key);
  };

  return { keyFor, recordFailure, isLocked, reset };
};

export type LockoutGuard = ReturnType<typeof createLockoutGuard>;
