import { describe, expect, it } from 'vitest';
import { loadLocales } from '../lib/localization.js';
import { DialogEngine } from './engine.js';
import { CorruptSessionError } from './errors.js';
import { createStepRegistry } from './registry.js';
import {
  MemorySessionStore,
  RedisSessionStore,
  createFreshSession,
  type RedisClient,
} from './sessionStore.js';
import { SURVEY_CATALOGUE } from './steps.js';

const defaults = { entryStepId: 'language', defaultLanguage: 'ru' };

/** In-process stand-in for the part of ioredis the store uses. */
class FakeRedis implements RedisClient {
  readonly data = new Map<string, string>();
  readonly ttls = new Map<string, number>();

  async get(key: string) {
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: string, _mode: 'PX', ttlMs: number) {
    this.data.set(key, value);
    this.ttls.set(key, ttlMs);
    return 'OK';
  }

  async del(key: string) {
    return this.data.delete(key) ? 1 : 0;
  }

  async scan(_cursor: string, _match: 'MATCH', pattern: string): Promise<[string, string[]]> {
    const prefix = pattern.replace(/\*$/, '');
    return ['0', [...this.data.keys()].filter(key => key.startsWith(prefix))];
  }
}

describe('createFreshSession', () => {
  it('starts at the entry step with nothing answered', () => {
    const session = createFreshSession('42', defaults, { username: 'anna', displayName: 'Anna' }, new Date('2026-03-01T10:00:00Z'));

    expect(session).toEqual({
      userId: '42',
      currentStep: 'language',
      answers: {},
      language: 'ru',
      history: [],
      selection: [],
      profile: { username: 'anna', displayName: 'Anna' },
      source: 'telegram',
      createdAt: '2026-03-01T10:00:00.000Z',
      lastActivityAt: '2026-03-01T10:00:00.000Z',
      completedAt: null,
    });
  });
});

describe('MemorySessionStore', () => {
  it('returns a fresh unsaved session for an unknown user', async () => {
    const store = new MemorySessionStore(defaults);

    const session = await store.get('1');
    expect(session.currentStep).toBe('language');
    expect(await store.find('1')).toBeNull();
    expect(store.size).toBe(0);
  });

  it('stores copies, so callers cannot mutate stored state', async () => {
    const store = new MemorySessionStore(defaults);
    const session = createFreshSession('1', defaults);
    await store.save(session);

    session.answers.name = 'changed after save';
    const loaded = await store.get('1');
    loaded.answers.level = 'changed after load';

    expect((await store.find('1'))?.answers).toEqual({});
  });

  it('deletes and lists sessions', async () => {
    const store = new MemorySessionStore(defaults);
    await store.save(createFreshSession('1', defaults));
    await store.save(createFreshSession('2', defaults));
    await store.delete('1');

    expect((await store.list()).map(s => s.userId)).toEqual(['2']);
  });
});

describe('RedisSessionStore', () => {
  it('round-trips sessions as JSON with the idle TTL', async () => {
    const redis = new FakeRedis();
    const store = new RedisSessionStore(redis, defaults, 60_000);
    const session = { ...createFreshSession('42', defaults), answers: { name: 'Анна' } };

    await store.save(session);

    expect(redis.ttls.get('survey:session:42')).toBe(60_000);
    expect(await store.find('42')).toEqual(session);
    expect((await store.list()).map(s => s.userId)).toEqual(['42']);

    await store.delete('42');
    expect(await store.find('42')).toBeNull();
  });

  it('refuses to read corrupt entries and leaves them in place', async () => {
    const redis = new FakeRedis();
    const store = new RedisSessionStore(redis, defaults, 60_000);
    const outdated = JSON.stringify({ userId: '2', currentStep: 'start_date', answers: { name: 'Анна' } });
    redis.data.set('survey:session:1', '{not json');
    redis.data.set('survey:session:2', outdated);

    await expect(store.find('1')).rejects.toBeInstanceOf(CorruptSessionError);
    await expect(store.get('2')).rejects.toThrow('Stored session of user 2 is unreadable: schema mismatch at language');
    expect(redis.data.get('survey:session:1')).toBe('{not json');
    expect(redis.data.get('survey:session:2')).toBe(outdated);
  });

  it('skips corrupt entries when listing', async () => {
    const redis = new FakeRedis();
    const store = new RedisSessionStore(redis, defaults, 60_000);
    await store.save(createFreshSession('1', defaults));
    redis.data.set('survey:session:2', '{not json');

    expect((await store.list()).map(s => s.userId)).toEqual(['1']);
  });
});

describe('RedisSessionStore with the dialog engine', () => {
  it('surfaces an outdated session instead of starting over', async () => {
    const redis = new FakeRedis();
    const registry = createStepRegistry(SURVEY_CATALOGUE);
    const engine = new DialogEngine({
      registry,
      store: new RedisSessionStore(redis, defaults, 60_000),
      localization: loadLocales(),
      defaultLanguage: 'ru',
      idleTimeoutMs: 60_000,
    });
    const outdated = JSON.stringify({ userId: '7', currentStep: 'start_date', answers: { name: 'Анна' }, language: 'ru' });
    redis.data.set('survey:session:7', outdated);

    await expect(engine.handleReply('7', { type: 'option', stepId: 'start_date', value: 'now' }))
      .rejects.toBeInstanceOf(CorruptSessionError);
    expect(redis.data.get('survey:session:7')).toBe(outdated);

    // явный /restart заменяет запись
    await engine.restart('7');
    expect(JSON.parse(redis.data.get('survey:session:7') ?? '{}')).toMatchObject({ currentStep: 'language', answers: {} });
  });
});
