import { Counter, Registry } from 'prom-client';

export type LoginOutcome = 'success' | 'mfa_challenge' | 'invalid_credentials' | 'inactive' | 'locked' | 'mfa_invalid';

export class AuthMetrics {
  private readonly registry: Registry;
  private readonly loginOutcomes: Counter<string>;
  private readonly refreshReuse: Counter<string>;
  private readonly degradedRevocationChecks: Counter<string>;
  private readonly counts = new Map<string, number>();

  constructor(registry?: Registry) {
    this.registry = registry ?? new Registry();
    this.loginOutcomes = new Counter({
      name: 'auth_login_outcome_total',
      help: 'Login attempts by outcome',
      registers: [this.registry],
      labelNames: ['outcome']
    });

    this.refreshReuse = new Counter({
      name: 'auth_refresh_reuse_total',
      help: 'Refresh tokens presented after rotation or revocation',
      registers: [this.registry]
    });

    this.degradedRevocationChecks = new Counter({
      name: 'auth_revocation_check_degraded_total',
      help: 'Access tokens accepted while the revocation registry was unreachable',
      registers: [this.registry]
    });
  }

  recordLogin(outcome: LoginOutcome) {
    this.loginOutcomes.labels(outcome).inc();
    this.bump(`login:${outcome}`);
  }

  recordRefreshReuse() {
    this.refreshReuse.inc();
    this.bump('refresh_reuse');
  }

  recordDegradedRevocationCheck() {
    this.degradedRevocationChecks.inc();
    this.bump('revocation_degraded');
  }

  getLoginCount(outcome: LoginOutcome) {
    return this.counts.get(`login:${outcome}`) ?? 0;
  }

  getRefreshReuseCount() {
    return this.counts.get('refresh_reuse') ?? 0;
  }

  getDegradedRevocationCount() {
    return this.counts.get('revocation_degraded') ?? 0;
  }

  getRegistry() {
    return this.registry;
  }

  private bump(key: string) {
    this.counts.set(key, (this.counts.get(key) ?? 0) + 1);
  }
}
