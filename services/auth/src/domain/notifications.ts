import type { Logger } from '../logging';

export type Notification =
  | { kind: 'mfa_code'; accountId: string; email: string; code: string }
  | { kind: 'mfa_setup'; accountId: string; email: string; code: string }
  | { kind: 'password_reset'; accountId: string; email: string; token: string }
  | { kind: 'email_verification'; accountId: string; email: string; token: string };

/** Out-of-band delivery of codes and links. */
export interface Notifier {
  send(notification: Notification): Promise<void>;
}

/** Development notifier: records that something was sent, never what. */
export const createLogNotifier = (logger: Logger): Notifier => ({
  async send(notification) {
    logger.info({ kind: notification.kind, accountId: notification.accountId }, 'notification dispatched');
  }
});
