import { afterEach, describe, expect, it } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../server.js';
import { toAnswers } from './leadWebhook.js';
import { LeadDispatcher } from '../lib/leadDispatcher.js';
import type { LeadNotifier } from '../lib/leadNotifier.js';
import { loadLocales } from '../lib/localization.js';
import { createStepRegistry } from '../survey/registry.js';
import { SURVEY_CATALOGUE } from '../survey/steps.js';
import type { ExportRecord } from '../survey/exportRecord.js';

const localization = loadLocales();
const registry = createStepRegistry(SURVEY_CATALOGUE);
const AUTH = { authorization: 'Bearer test-secret' };

interface Harness {
  app: FastifyInstance;
  saved: ExportRecord[];
  sent: ExportRecord[];
}

let current: FastifyInstance | null = null;

afterEach(async () => {
  await current?.close();
  current = null;
});

async function harness(opts: { sheetsDown?: boolean; explode?: boolean } = {}): Promise<Harness> {
  const saved: ExportRecord[] = [];
  const sent: ExportRecord[] = [];
  const notifier: LeadNotifier = {
    notify: async record => {
      sent.push(record);
    },
  };
  const dispatcher = new LeadDispatcher({
    append: async record => {
      if (opts.sheetsDown) throw new Error('sheets down');
      saved.push(record);
    },
  }, notifier, { registry, localization, exportLanguage: 'ru', timezone: 'Europe/Moscow' });

  const app = await buildServer({
    webhook: {
      secret: 'test-secret',
      registry,
      dispatcher: opts.explode
        ? { dispatch: async () => { throw new Error('boom'); } }
        : dispatcher,
    },
  });
  current = app;
  return { app, saved, sent };
}

describe('POST /webhook/lead', () => {
  it('rejects requests without the shared secret', async () => {
    const { app, saved } = await harness();

    const res = await app.inject({
      method: 'POST',
      url: '/webhook/lead',
      headers: { authorization: 'Bearer wrong' },
      payload: { name: 'Иван', phone: '+79990001122' },
    });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: 'Unauthorized' });
    expect(saved).toHaveLength(0);
  });

  it('rejects payloads without a name or phone', async () => {
    const { app } = await harness();

    const res = await app.inject({ method: 'POST', url: '/webhook/lead', headers: AUTH, payload: { name: 'Иван' } });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'Invalid data' });
  });

  it('stores and forwards a JSON lead', async () => {
    const { app, saved, sent } = await harness();

    const res = await app.inject({
      method: 'POST',
      url: '/webhook/lead',
      headers: AUTH,
      payload: { name: 'Иван', phone: '8 999 000-11-22', goals: 'Путешествия', schedule: 'Осенью' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      success: true,
      message: 'Lead successfully processed',
      telegram_sent: true,
      sheets_saved: true,
    });
    expect(saved).toHaveLength(1);
    expect(sent).toHaveLength(1);
    expect(saved[0].leadId).toMatch(/^web:[0-9a-f]{12}:\d+$/);
    expect(saved[0].fields).toMatchObject({
      name: 'Иван',
      phone: '+79990001122',
      goal: 'Путешествия',
      startDate: 'Осенью',
      source: 'Сайт',
    });
  });

  it('accepts form-encoded bodies', async () => {
    const { app, saved } = await harness();

    const res = await app.inject({
      method: 'POST',
      url: '/webhook/lead',
      headers: { ...AUTH, 'content-type': 'application/x-www-form-urlencoded' },
      payload: 'name=%D0%98%D0%B2%D0%B0%D0%BD&phone=%2B79990001122',
    });

    expect(res.statusCode).toBe(200);
    expect(saved[0].fields.name).toBe('Иван');
  });

  it('reports partial failures with 500', async () => {
    const { app, sent } = await harness({ sheetsDown: true });

    const res = await app.inject({
      method: 'POST',
      url: '/webhook/lead',
      headers: AUTH,
      payload: { name: 'Иван', phone: '+79990001122' },
    });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({
      success: false,
      message: 'Lead processed with errors',
      telegram_sent: true,
      sheets_saved: false,
    });
    expect(sent).toHaveLength(1);
  });

  it('answers 500 when processing throws', async () => {
    const { app } = await harness({ explode: true });

    const res = await app.inject({
      method: 'POST',
      url: '/webhook/lead',
      headers: AUTH,
      payload: { name: 'Иван', phone: '+79990001122' },
    });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: 'Internal server error' });
  });
});

describe('health endpoints', () => {
  it('serves the webhook health check', async () => {
    const { app } = await harness();

    const res = await app.inject({ method: 'GET', url: '/webhook/health' });

    expect(res.json()).toEqual({ status: 'healthy', service: 'webhook_handler' });
  });

  it('serves /health without the webhook', async () => {
    const app = await buildServer({ webhook: null });
    current = app;

    const res = await app.inject({ method: 'GET', url: '/health' });
    const webhook = await app.inject({ method: 'POST', url: '/webhook/lead', headers: AUTH, payload: {} });

    expect(res.json()).toMatchObject({ status: 'ok', service: 'lead-bot' });
    expect(webhook.statusCode).toBe(404);
  });
});

describe('toAnswers', () => {
  it('maps form fields to answer keys', () => {
    expect(toAnswers({ name: 'Иван', phone: '+7 (999) 000-11-22', level: 'A2', expectations: 'Разговор' })).toEqual({
      name: 'Иван',
      phone: '+79990001122',
      level: 'A2',
      expectations: 'Разговор',
    });
  });

  it('keeps an unreadable phone as typed', () => {
    expect(toAnswers({ name: 'Иван', phone: '12-34' }).phone).toBe('12-34');
  });
});
