import type { EphemeralStore } from '../../repositories/ephemeralStore';

export interface RevocationRegistry {
  revoke(jti: string, expiresAt: Date): Promise<void>;
  isRevoked(jti: string): Promise<boolean>;
}

const keyFor = (jti: string) => `revoked:${jti}`;

export const createRevocationRegistry = (store: EphemeralStore, now: () => number = () => Date.now()): RevocationRegistry => ({
  async revoke(jti, expiresAt) {
    const ttlMs = expiresAt.getTime() - now();
    // Already expired tokens are rejected on their own; nothing to remember.
    if (ttlMs <= 0) {
      return;
    }
    await store.set(keyFor(jti), '1', ttlMs);
  },
  async isRevoked(jti) {
    return (await store.get(keyFor(jti))) !== null;
  }
});
