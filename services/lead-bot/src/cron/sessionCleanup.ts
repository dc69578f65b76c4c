import cron, { type ScheduledTask } from 'node-cron';
import { createLogger } from '../lib/logger.js';
import type { RateLimiter } from '../lib/rateLimiter.js';
import type { DialogEngine } from '../survey/engine.js';

const logger = createLogger({ module: 'cron-session-cleanup' });

export async function cleanupSessions(engine: DialogEngine, rateLimiter: RateLimiter): Promise<number> {
  const expired = await engine.expireIdle();
  rateLimiter.prune();
  if (expired > 0) {
    logger.info({ expired }, 'Idle sessions removed');
  }
  return expired;
}

export function startSessionCleanupCron(
  schedule: string,
  engine: DialogEngine,
  rateLimiter: RateLimiter,
): ScheduledTask {
  const task = cron.schedule(schedule, () => {
    cleanupSessions(engine, rateLimiter).catch(err => {
      logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Cron job failed');
    });
  });

  logger.info({ schedule }, 'Session cleanup cron scheduled');
  return task;
}
