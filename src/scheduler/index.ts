import cron from 'node-cron';
import { createLogger } from '../utils/logger.js';
import type { SessionStore } from '../core/relay/SessionStore.js';
import type { RateLimiter } from '../core/relay/RateLimiter.js';

const logger = createLogger({ component: 'scheduler' });

export const SWEEP_CRON_EXPRESSION = '* * * * *';

export interface SweepTask {
  stop(): void;
}

/** Evicts idle sessions and stale rate-limit windows once a minute. */
export function scheduleSessionSweep(sessions: SessionStore, rateLimiter: RateLimiter, idleMs: number): SweepTask {
  logger.info({ cronExpression: SWEEP_CRON_EXPRESSION, idleMs }, 'Scheduling session sweep');

  const task = cron.schedule(SWEEP_CRON_EXPRESSION, () => {
    const evicted = sessions.sweep(idleMs);
    const dropped = rateLimiter.sweep();
    if (evicted > 0 || dropped > 0) {
      logger.info({ evicted, dropped, remaining: sessions.size }, 'Swept idle sessions');
    }
  });

  return {
    stop: () => {
      task.stop();
    },
  };
}
