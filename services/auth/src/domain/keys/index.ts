export { createKeyResolver } from './keyResolver';
export type { KeyMaterial, KeyResolver } from './types';
