import { describe, expect, it } from 'vitest';
import { loadLocales } from './localization.js';
import { answerCallbackData, parseCallbackData, promptMarkup, statusCallbackData, statusKeyboard } from './telegram.js';
import type { PromptView } from '../survey/types.js';

const localization = loadLocales();

describe('callback data', () => {
  it('parses answer buttons', () => {
    expect(parseCallbackData(answerCallbackData('level', 'beginner')))
      .toEqual({ type: 'answer', stepId: 'level', value: 'beginner' });
  });

  it('keeps colons inside lead ids', () => {
    expect(parseCallbackData(statusCallbackData('done', 'web:abc:1773567000000')))
      .toEqual({ type: 'status', status: 'done', leadId: 'web:abc:1773567000000' });
  });

  it('treats anything else as unknown', () => {
    expect(parseCallbackData(undefined)).toEqual({ type: 'unknown' });
    expect(parseCallbackData('a:level')).toEqual({ type: 'unknown' });
    expect(parseCallbackData('a::x')).toEqual({ type: 'unknown' });
    expect(parseCallbackData('st:archived:42:1')).toEqual({ type: 'unknown' });
    expect(parseCallbackData('x:level:beginner')).toEqual({ type: 'unknown' });
  });
});

describe('promptMarkup', () => {
  const base = { text: 'q', acceptsContact: false, language: 'ru' };

  it('has no keyboard for plain text questions', () => {
    expect(promptMarkup({ ...base, stepId: 'name', kind: 'text', options: [] }, localization)).toBeUndefined();
  });

  it('offers a contact button for the phone question', () => {
    const prompt: PromptView = { ...base, stepId: 'phone', kind: 'text', options: [], acceptsContact: true };
    expect(promptMarkup(prompt, localization)).toEqual({
      keyboard: [[{ text: localization.t('share_contact', 'ru'), request_contact: true }]],
      resize_keyboard: true,
      one_time_keyboard: true,
    });
  });

  it('marks picked options and adds the done button on multi-choice steps', () => {
    const prompt: PromptView = {
      ...base,
      stepId: 'expectations',
      kind: 'multi',
      options: [
        { value: 'plateau', label: 'Выйти с «плато»', selected: true },
        { value: 'ease', label: 'Лёгкая атмосфера', selected: false },
      ],
      doneLabel: 'Готово ✔️',
    };

    expect(promptMarkup(prompt, localization)).toEqual({
      inline_keyboard: [
        [{ text: '✅ Выйти с «плато»', callback_data: 'a:expectations:plateau' }],
        [{ text: 'Лёгкая атмосфера', callback_data: 'a:expectations:ease' }],
        [{ text: 'Готово ✔️', callback_data: 'a:expectations:__done__' }],
      ],
    });
  });
});

describe('statusKeyboard', () => {
  it('offers the forward statuses', () => {
    expect(statusKeyboard('42:1773567000000', localization, 'ru')).toEqual({
      inline_keyboard: [[
        { text: '🟡 В работе', callback_data: 'st:in_progress:42:1773567000000' },
        { text: '✅ Обработано', callback_data: 'st:done:42:1773567000000' },
      ]],
    });
  });
});
