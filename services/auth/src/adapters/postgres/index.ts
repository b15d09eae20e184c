export { getPool, closePool } from './pool';
export { runMigrations } from './migrate';
export { createPostgresAccountsRepository } from './accountsRepository';
export { createPostgresTokensRepository } from './tokensRepository';
