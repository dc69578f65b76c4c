import type { RateLimitSettings } from '../config.js';
import { createLogger } from './logger.js';

const log = createLogger({ module: 'rateLimiter' });

export type RateLimitKind = 'message' | 'callback' | 'command';

export interface RateLimitDecision {
  allowed: boolean;
  /** Seconds until the user may write again; 0 when allowed. */
  retryAfterSeconds: number;
}

const WINDOW_MS = 60_000;

/**
 * Скользящее окно в минуту на пользователя и тип события. Превышение лимита
 * блокирует пользователя целиком на cooldown.
 */
export class RateLimiter {
  private readonly hits = new Map<string, number[]>(); // `${kind}:${userId}` → timestamps
  private readonly blockedUntil = new Map<string, number>();

  constructor(
    private readonly settings: RateLimitSettings,
    private readonly now: () => number = Date.now,
  ) {}

  private limitFor(kind: RateLimitKind): number {
    switch (kind) {
      case 'message': return this.settings.messagesPerMinute;
      case 'callback': return this.settings.callbacksPerMinute;
      case 'command': return this.settings.commandsPerMinute;
    }
  }

  check(userId: string, kind: RateLimitKind): RateLimitDecision {
    const now = this.now();

    const blocked = this.blockedUntil.get(userId);
    if (blocked !== undefined) {
      if (blocked > now) {
        return { allowed: false, retryAfterSeconds: Math.ceil((blocked - now) / 1000) };
      }
      this.blockedUntil.delete(userId);
    }

    const key = `${kind}:${userId}`;
    const recent = (this.hits.get(key) || []).filter(t => now - t < WINDOW_MS);

    if (recent.length >= this.limitFor(kind)) {
      const cooldownMs = this.settings.cooldownSeconds * 1000;
      this.hits.set(key, recent);
      if (cooldownMs > 0) {
        this.blockedUntil.set(userId, now + cooldownMs);
      }
      log.warn({ userId, kind, limit: this.limitFor(kind) }, 'Rate limit exceeded');
      return {
        allowed: false,
        retryAfterSeconds: cooldownMs > 0 ? this.settings.cooldownSeconds : Math.ceil((recent[0] + WINDOW_MS - now) / 1000),
      };
    }

    recent.push(now);
    this.hits.set(key, recent);
    return { allowed: true, retryAfterSeconds: 0 };
  }

  /** Drops empty windows and finished cooldowns. */
  prune(): void {
    const now = this.now();
    for (const [key, timestamps] of this.hits) {
      const recent = timestamps.filter(t => now - t < WINDOW_MS);
      if (recent.length === 0) this.hits.delete(key);
      else this.hits.set(key, recent);
    }
    for (const [userId, until] of this.blockedUntil) {
      if (until <= now) this.blockedUntil.delete(userId);
    }
  }

  get trackedKeys(): number {
    return this.hits.size;
  }
}
