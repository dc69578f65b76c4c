import { describe, expect, it, vi } from 'vitest';
import { LeadDispatcher, type LeadSink } from './leadDispatcher.js';
import { TelegramLeadNotifier, type StaffBot } from './leadNotifier.js';
import { loadLocales } from './localization.js';
import { createStepRegistry } from '../survey/registry.js';
import { createFreshSession } from '../survey/sessionStore.js';
import { SURVEY_CATALOGUE } from '../survey/steps.js';
import { COMPLETE, type SurveySession } from '../survey/types.js';
import type { ExportRecord } from '../survey/exportRecord.js';

const localization = loadLocales();
const exportOptions = {
  registry: createStepRegistry(SURVEY_CATALOGUE),
  localization,
  exportLanguage: 'ru',
  timezone: 'Europe/Moscow',
};

const session: SurveySession = {
  ...createFreshSession('42', { entryStepId: 'language', defaultLanguage: 'ru' }),
  currentStep: COMPLETE,
  answers: { name: 'Анна', phone: '+79991234567' },
  completedAt: '2026-03-15T09:30:00.000Z',
};

function sink(fail = false) {
  const rows: ExportRecord[] = [];
  const value: LeadSink = {
    append: async record => {
      if (fail) throw new Error('sheets down');
      rows.push(record);
    },
  };
  return { rows, value };
}

function staffBot(fail = false) {
  const sendMessage = vi.fn<StaffBot['sendMessage']>(async () => {
    if (fail) throw new Error('telegram down');
    return { message_id: 1, date: 0, chat: { id: -100, type: 'supergroup' } };
  });
  return { sendMessage };
}

describe('LeadDispatcher', () => {
  it('persists and notifies', async () => {
    const table = sink();
    const bot = staffBot();
    const dispatcher = new LeadDispatcher(table.value, new TelegramLeadNotifier(bot, '-100', localization, 'ru'), exportOptions);

    const result = await dispatcher.dispatch(session);

    expect(result).toMatchObject({ persisted: true, notified: true, duplicate: false });
    expect(table.rows.map(r => r.leadId)).toEqual(['42:1773567000000']);

    expect(bot.sendMessage).toHaveBeenCalledTimes(1);
    const [chatId, text, options] = bot.sendMessage.mock.calls[0];
    expect(chatId).toBe('-100');
    expect(text.split('\n')[0]).toBe('🔔 <b>Новая заявка</b>');
    expect(options).toMatchObject({ parse_mode: 'HTML' });
  });

  it('notifies staff even when the sheet is down', async () => {
    const bot = staffBot();
    const dispatcher = new LeadDispatcher(sink(true).value, new TelegramLeadNotifier(bot, '-100', localization, 'ru'), exportOptions);

    const result = await dispatcher.dispatch(session);

    expect(result).toMatchObject({ persisted: false, notified: true });
    expect(bot.sendMessage).toHaveBeenCalledTimes(1);
  });

  it('persists even when telegram is down', async () => {
    const table = sink();
    const dispatcher = new LeadDispatcher(table.value, new TelegramLeadNotifier(staffBot(true), '-100', localization, 'ru'), exportOptions);

    const result = await dispatcher.dispatch(session);

    expect(result).toMatchObject({ persisted: true, notified: false });
    expect(table.rows).toHaveLength(1);
  });

  it('does not write the same lead twice', async () => {
    const table = sink();
    const bot = staffBot();
    const dispatcher = new LeadDispatcher(table.value, new TelegramLeadNotifier(bot, '-100', localization, 'ru'), exportOptions);

    await dispatcher.dispatch(session);
    const again = await dispatcher.dispatch(session);

    expect(again).toMatchObject({ duplicate: true, notified: false });
    expect(table.rows).toHaveLength(1);
    expect(bot.sendMessage).toHaveBeenCalledTimes(1);
  });

  it('retries a lead whose write failed', async () => {
    let failing = true;
    const rows: ExportRecord[] = [];
    const flaky: LeadSink = {
      append: async record => {
        if (failing) throw new Error('sheets down');
        rows.push(record);
      },
    };
    const dispatcher = new LeadDispatcher(flaky, new TelegramLeadNotifier(staffBot(), '-100', localization, 'ru'), exportOptions);

    await dispatcher.dispatch(session);
    failing = false;
    const result = await dispatcher.dispatch(session);

    expect(result.duplicate).toBe(false);
    expect(rows).toHaveLength(1);
  });
});
