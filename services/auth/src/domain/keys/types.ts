export interface KeyMaterial {
  kid: string;
  secret: Uint8Array;
  /** Epoch ms after which the key is no longer accepted for verification. */
  notAfter?: number;
  active: boolean;
}

export interface KeyResolver {
  getActiveSigningKey(): KeyMaterial;
  getVerificationKey(kid: string, now: number): KeyMaterial | undefined;
}
