import type TelegramBot from 'node-telegram-bot-api';
import type { Localization } from './localization.js';
import { DONE_VALUE } from '../survey/prompt.js';
import { LEAD_STATUSES, type LeadStatus } from '../survey/exportRecord.js';
import type { PromptView } from '../survey/types.js';

// callback_data: a:<stepId>:<value> — ответ на шаг, st:<status>:<leadId> — статус заявки
const ANSWER_PREFIX = 'a';
const STATUS_PREFIX = 'st';

export type CallbackAction =
  | { type: 'answer'; stepId: string; value: string }
  | { type: 'status'; status: LeadStatus; leadId: string }
  | { type: 'unknown' };

export function answerCallbackData(stepId: string, value: string): string {
  return `${ANSWER_PREFIX}:${stepId}:${value}`;
}

export function statusCallbackData(status: LeadStatus, leadId: string): string {
  return `${STATUS_PREFIX}:${status}:${leadId}`;
}

function isLeadStatus(value: string): value is LeadStatus {
  return LEAD_STATUSES.some(status => status === value);
}

export function parseCallbackData(data: string | undefined): CallbackAction {
  if (!data) return { type: 'unknown' };

  const first = data.indexOf(':');
  const second = first === -1 ? -1 : data.indexOf(':', first + 1);
  if (second === -1) return { type: 'unknown' };

  const prefix = data.slice(0, first);
  const middle = data.slice(first + 1, second);
  const rest = data.slice(second + 1);
  if (!middle || !rest) return { type: 'unknown' };

  if (prefix === ANSWER_PREFIX) {
    return { type: 'answer', stepId: middle, value: rest };
  }
  if (prefix === STATUS_PREFIX && isLeadStatus(middle)) {
    return { type: 'status', status: middle, leadId: rest };
  }
  return { type: 'unknown' };
}

export type PromptMarkup =
  | TelegramBot.InlineKeyboardMarkup
  | TelegramBot.ReplyKeyboardMarkup
  | TelegramBot.ReplyKeyboardRemove;

/**
 * Клавиатура для вопроса: inline-кнопки для выбора, «поделиться контактом»
 * для телефона
 */
export function promptMarkup(prompt: PromptView, localization: Localization): PromptMarkup | undefined {
  if (prompt.kind === 'text') {
    if (!prompt.acceptsContact) return undefined;
    return {
      keyboard: [[{ text: localization.t('share_contact', prompt.language), request_contact: true }]],
      resize_keyboard: true,
      one_time_keyboard: true,
    };
  }

  const rows: TelegramBot.InlineKeyboardButton[][] = prompt.options.map(option => ([{
    text: option.selected ? `✅ ${option.label}` : option.label,
    callback_data: answerCallbackData(prompt.stepId, option.value),
  }]));

  if (prompt.kind === 'multi' && prompt.doneLabel) {
    rows.push([{ text: prompt.doneLabel, callback_data: answerCallbackData(prompt.stepId, DONE_VALUE) }]);
  }

  return { inline_keyboard: rows };
}

export function removeKeyboard(): TelegramBot.ReplyKeyboardRemove {
  return { remove_keyboard: true };
}

export function statusKeyboard(leadId: string, localization: Localization, lang: string): TelegramBot.InlineKeyboardMarkup {
  return {
    inline_keyboard: [[
      { text: `🟡 ${localization.t('lead_status.in_progress', lang)}`, callback_data: statusCallbackData('in_progress', leadId) },
      { text: `✅ ${localization.t('lead_status.done', lang)}`, callback_data: statusCallbackData('done', leadId) },
    ]],
  };
}
