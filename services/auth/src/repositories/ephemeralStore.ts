/**
 * Shared key/value store with native expiry. Backs the revocation registry,
 * lockout counters and MFA codes. Implementations raise StoreUnavailableError
 * when the backing service cannot be reached.
 */
export interface EphemeralStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlMs: number): Promise<void>;
  /** Increments and returns the counter; the TTL is only applied when the key is created. */
  incrementWithTtl(key: string, ttlMs: number): Promise<number>;
  /** Resolves true only for the call that actually removed the key. */
  delete(key: string): Promise<boolean>;
}
