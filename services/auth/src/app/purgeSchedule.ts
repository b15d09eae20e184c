import type { Logger } from '../logging';

export interface PurgeScheduleOptions {
  purge: () => Promise<number>;
  logger: Logger;
  intervalMs: number;
}

/** Periodically drops expired refresh records. The timer never keeps the process alive. */
export const schedulePurge = ({ purge, logger, intervalMs }: PurgeScheduleOptions) => {
  const timer = setInterval(() => {
    purge()
      .then((purged) => {
        if (purged > 0) {
          logger.info({ purged }, 'expired refresh tokens purged');
        }
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, 'refresh token purge failed');
      });
  }, intervalMs);
  timer.unref();
  return () => clearInterval(timer);
};
