import { Redis } from 'ioredis';
import { createLogger } from './logger.js';

const log = createLogger({ module: 'redis' });

/** Reconnect delay: +50ms per attempt, capped at 2s. */
export function redisRetryDelay(times: number): number {
  return Math.min(times * 50, 2000);
}

export interface RedisClientOptions {
  /** Don't connect until the first command. */
  lazyConnect?: boolean;
}

export function createRedisClient(url: string, options: RedisClientOptions = {}): Redis {
  const redis = new Redis(url, {
    retryStrategy: redisRetryDelay,
    // команды не копятся в очереди, пока Redis недоступен
    maxRetriesPerRequest: 3,
    lazyConnect: options.lazyConnect ?? false,
  });

  redis.on('connect', () => {
    log.info('Redis connected');
  });

  redis.on('ready', () => {
    log.info('Redis ready to accept commands');
  });

  redis.on('error', (err: Error) => {
    log.error({ error: err.message }, 'Redis connection error');
  });

  return redis;
}
