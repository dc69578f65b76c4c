/**
 * Хранилище сессий опроса
 *
 * - MemorySessionStore: Map в памяти процесса (по умолчанию)
 * - RedisSessionStore: JSON в Redis с TTL = таймаут неактивности
 */

import { z } from 'zod';
import { createLogger } from '../lib/logger.js';
import { CorruptSessionError } from './errors.js';
import type { StepId, SurveySession, UserProfile } from './types.js';

const log = createLogger({ module: 'sessionStore' });

export interface SessionDefaults {
  entryStepId: StepId;
  defaultLanguage: string;
}

export function createFreshSession(
  userId: string,
  defaults: SessionDefaults,
  profile: UserProfile = { username: null, displayName: null },
  now: Date = new Date(),
): SurveySession {
  const timestamp = now.toISOString();
  return {
    userId,
    currentStep: defaults.entryStepId,
    answers: {},
    language: defaults.defaultLanguage,
    history: [],
    selection: [],
    profile: { ...profile },
    source: 'telegram',
    createdAt: timestamp,
    lastActivityAt: timestamp,
    completedAt: null,
  };
}

function cloneSession(session: SurveySession): SurveySession {
  return structuredClone(session);
}

/**
 * Единственное место чтения/записи сессий. Сериализация по пользователю —
 * снаружи, через UserLock.
 */
export abstract class SessionStore {
  constructor(protected readonly defaults: SessionDefaults) {}

  abstract find(userId: string): Promise<SurveySession | null>;
  abstract save(session: SurveySession): Promise<void>;
  abstract delete(userId: string): Promise<void>;
  abstract list(): Promise<SurveySession[]>;

  /**
   * Stored session, or a fresh unsaved one at the entry step.
   */
  async get(userId: string, profile?: UserProfile): Promise<SurveySession> {
    const existing = await this.find(userId);
    return existing ?? createFreshSession(userId, this.defaults, profile);
  }
}

export class MemorySessionStore extends SessionStore {
  private readonly sessions = new Map<string, SurveySession>();

  async find(userId: string): Promise<SurveySession | null> {
    const session = this.sessions.get(userId);
    return session ? cloneSession(session) : null;
  }

  async save(session: SurveySession): Promise<void> {
    this.sessions.set(session.userId, cloneSession(session));
  }

  async delete(userId: string): Promise<void> {
    this.sessions.delete(userId);
  }

  async list(): Promise<SurveySession[]> {
    return [...this.sessions.values()].map(cloneSession);
  }

  get size(): number {
    return this.sessions.size;
  }
}

// =====================================================
// Redis
// =====================================================

/** The subset of the ioredis client the store uses. */
export interface RedisClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'PX', ttlMs: number): Promise<unknown>;
  del(key: string): Promise<number>;
  scan(
    cursor: string,
    matchToken: 'MATCH',
    pattern: string,
    countToken: 'COUNT',
    count: number,
  ): Promise<[string, string[]]>;
}

const sessionSchema = z.object({
  userId: z.string(),
  currentStep: z.string(),
  answers: z.record(z.string()),
  language: z.string(),
  history: z.array(z.string()),
  selection: z.array(z.string()),
  profile: z.object({
    username: z.string().nullable(),
    displayName: z.string().nullable(),
  }),
  source: z.enum(['telegram', 'website']),
  createdAt: z.string(),
  lastActivityAt: z.string(),
  completedAt: z.string().nullable(),
});

const KEY_PREFIX = 'survey:session:';

export class RedisSessionStore extends SessionStore {
  constructor(
    private readonly redis: RedisClient,
    defaults: SessionDefaults,
    private readonly ttlMs: number,
  ) {
    super(defaults);
  }

  private key(userId: string): string {
    return `${KEY_PREFIX}${userId}`;
  }

  private parse(raw: string): { ok: true; session: SurveySession } | { ok: false; reason: string } {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      return { ok: false, reason: err instanceof Error ? err.message : String(err) };
    }
    const parsed = sessionSchema.safeParse(json);
    if (!parsed.success) {
      const fields = parsed.error.issues.map(issue => issue.path.join('.') || '(root)');
      return { ok: false, reason: `schema mismatch at ${fields.join(', ')}` };
    }
    return { ok: true, session: parsed.data };
  }

  /**
   * Unreadable entries throw CorruptSessionError and stay in Redis untouched;
   * only an explicit restart replaces them.
   */
  async find(userId: string): Promise<SurveySession | null> {
    const key = this.key(userId);
    const raw = await this.redis.get(key);
    if (raw === null) return null;

    const result = this.parse(raw);
    if (!result.ok) {
      log.error({ key, reason: result.reason }, 'Stored session is unreadable');
      throw new CorruptSessionError(userId, result.reason);
    }
    return result.session;
  }

  async save(session: SurveySession): Promise<void> {
    await this.redis.set(this.key(session.userId), JSON.stringify(session), 'PX', this.ttlMs);
  }

  async delete(userId: string): Promise<void> {
    await this.redis.del(this.key(userId));
  }

  async list(): Promise<SurveySession[]> {
    const sessions: SurveySession[] = [];
    let cursor = '0';
    do {
      const [next, keys] = await this.redis.scan(cursor, 'MATCH', `${KEY_PREFIX}*`, 'COUNT', 100);
      cursor = next;
      for (const key of keys) {
        const raw = await this.redis.get(key);
        if (raw === null) continue;
        const result = this.parse(raw);
        if (result.ok) {
          sessions.push(result.session);
        } else {
          log.warn({ key, reason: result.reason }, 'Skipping unreadable session');
        }
      }
    } while (cursor !== '0');
    return sessions;
  }
}
