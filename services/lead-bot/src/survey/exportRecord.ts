/**
 * Export Normalizer
 *
 * Завершённая сессия → плоская запись заявки с фиксированным порядком полей.
 * Значения вариантов переводятся в подписи на языке выгрузки, пустые поля
 * заменяются на «Не указано». Функции чистые: время берётся из completedAt.
 */

import { formatPhoneNumber } from '../lib/phoneNormalization.js';
import type { Localization } from '../lib/localization.js';
import { UnknownAnswerKeyError } from './errors.js';
import type { StepRegistry } from './registry.js';
import { COMPLETE, type AnswerKey, type SurveySession, type UserProfile } from './types.js';

export const EXPORT_FIELDS = [
  'timestamp',
  'telegramId',
  'username',
  'name',
  'phone',
  'language',
  'level',
  'goal',
  'goalDetails',
  'format',
  'expectations',
  'startDate',
  'source',
  'status',
  'leadId',
] as const;

export type ExportField = (typeof EXPORT_FIELDS)[number];

export type LeadStatus = 'new' | 'in_progress' | 'done';

export const LEAD_STATUSES: readonly LeadStatus[] = ['new', 'in_progress', 'done'];

export interface ExportRecord {
  leadId: string;
  userId: string;
  /** Month of completion in the export language, e.g. «Октябрь». */
  month: string;
  completedAt: string;
  fields: Record<ExportField, string>;
}

export interface ExportOptions {
  registry: StepRegistry;
  localization: Localization;
  exportLanguage: string;
  timezone: string;
}

/** Export fields filled straight from answers, by answer key. */
const ANSWER_FIELDS: ReadonlyArray<[ExportField, AnswerKey]> = [
  ['name', 'name'],
  ['phone', 'phone'],
  ['language', 'language'],
  ['level', 'level'],
  ['goal', 'goal'],
  ['goalDetails', 'goal_details'],
  ['format', 'format'],
  ['expectations', 'expectations'],
  ['startDate', 'start_date'],
];

export function buildLeadId(userId: string, completedAt: string): string {
  return `${userId}:${Date.parse(completedAt)}`;
}

/**
 * `<userId>:<epochMs>` → parts; userId itself may contain colons (web:…).
 */
export function parseLeadId(leadId: string): { userId: string; completedAt: string } | null {
  const separator = leadId.lastIndexOf(':');
  if (separator <= 0) return null;

  const epochMs = Number(leadId.slice(separator + 1));
  if (!Number.isInteger(epochMs) || epochMs <= 0) return null;

  return { userId: leadId.slice(0, separator), completedAt: new Date(epochMs).toISOString() };
}

interface ZonedParts {
  day: string;
  month: string;
  year: string;
  hour: string;
  minute: string;
}

function zonedParts(iso: string, timezone: string): ZonedParts {
  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone: timezone,
    day: '2-digit',
    month: '2-digit',
    year: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(new Date(iso));

  const pick = (type: Intl.DateTimeFormatPartTypes) => parts.find(p => p.type === type)?.value ?? '';
  return { day: pick('day'), month: pick('month'), year: pick('year'), hour: pick('hour'), minute: pick('minute') };
}

/**
 * dd.MM.yyyy HH:mm в часовом поясе школы
 */
export function formatTimestamp(iso: string, timezone: string): string {
  const p = zonedParts(iso, timezone);
  return `${p.day}.${p.month}.${p.year} ${p.hour}:${p.minute}`;
}

export function monthName(iso: string, timezone: string, localization: Localization, lang: string): string {
  const month = Number(zonedParts(iso, timezone).month);
  return localization.t(`month.${month}`, lang);
}

/**
 * Stored value → label in the export language. Multi-choice values are
 * comma-joined option values; anything that is not an option (free text
 * from the website form) passes through unchanged.
 */
function exportValue(key: AnswerKey, raw: string, options: ExportOptions): string {
  const step = options.registry.stepForAnswerKey(key);
  if (!step || step.kind === 'text') return raw;

  const labelOf = (value: string) => {
    const option = step.options.find(o => o.value === value);
    return option ? options.localization.t(option.labelKey, options.exportLanguage) : null;
  };

  if (step.kind === 'multi') {
    const labels = raw.split(',').map(labelOf);
    return labels.every(label => label !== null) ? labels.join(', ') : raw;
  }
  return labelOf(raw) ?? raw;
}

/**
 * Completed session → export record. Throws when the session is not complete.
 */
export function normalizeSession(session: SurveySession, options: ExportOptions): ExportRecord {
  if (session.currentStep !== COMPLETE || session.completedAt === null) {
    throw new Error(`Session ${session.userId} is not complete`);
  }

  const { localization, exportLanguage: lang } = options;
  const notSpecified = localization.t('export.not_specified', lang);
  const orDefault = (value: string | null | undefined) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : notSpecified;
  };

  const completedAt = session.completedAt;
  const leadId = buildLeadId(session.userId, completedAt);
  const username = session.profile.username;

  const fields: Record<ExportField, string> = {
    timestamp: formatTimestamp(completedAt, options.timezone),
    telegramId: session.source === 'telegram' ? session.userId : notSpecified,
    username: username ? `@${username}` : notSpecified,
    name: notSpecified,
    phone: notSpecified,
    language: notSpecified,
    level: notSpecified,
    goal: notSpecified,
    goalDetails: notSpecified,
    format: notSpecified,
    expectations: notSpecified,
    startDate: notSpecified,
    source: localization.t(`export.source.${session.source}`, lang),
    status: localization.t('lead_status.new', lang),
    leadId,
  };

  for (const [field, key] of ANSWER_FIELDS) {
    const raw = session.answers[key];
    fields[field] = orDefault(raw === undefined ? undefined : exportValue(key, raw, options));
  }

  return {
    leadId,
    userId: session.userId,
    month: monthName(completedAt, options.timezone, localization, lang),
    completedAt,
    fields,
  };
}

export function toRow(record: ExportRecord): string[] {
  return EXPORT_FIELDS.map(field => record.fields[field]);
}

export function headerRow(localization: Localization, lang: string): string[] {
  return EXPORT_FIELDS.map(field => localization.t(`export.header.${field}`, lang));
}

// =====================================================
// Сообщение для менеджеров
// =====================================================

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

const SUMMARY_LINES: ReadonlyArray<[string, ExportField]> = [
  ['👤', 'name'],
  ['📱', 'phone'],
  ['💬', 'username'],
  ['🌐', 'language'],
  ['📊', 'level'],
  ['🎯', 'goal'],
  ['📝', 'goalDetails'],
  ['👥', 'format'],
  ['✨', 'expectations'],
  ['📅', 'startDate'],
  ['📍', 'source'],
];

/**
 * HTML-сводка заявки для чата менеджеров
 */
export function formatLeadSummary(record: ExportRecord, localization: Localization, lang: string): string {
  const lines = [`🔔 <b>${escapeHtml(localization.t('summary.title', lang))}</b>`, ''];

  for (const [icon, field] of SUMMARY_LINES) {
    const label = escapeHtml(localization.t(`export.header.${field}`, lang));
    const raw = record.fields[field];
    const value = field === 'phone' ? formatPhoneNumber(raw) : raw;
    lines.push(`${icon} <b>${label}:</b> ${escapeHtml(value)}`);
  }

  lines.push('', `🕐 ${escapeHtml(record.fields.timestamp)}`);
  return lines.join('\n');
}

// =====================================================
// Заявки с сайта
// =====================================================

export interface ExternalLead {
  userId: string;
  answers: Record<string, string>;
  profile?: UserProfile;
  language?: string;
  completedAt?: Date;
}

/**
 * Completed session for a lead that did not come through the chat (website
 * form). Answer keys must belong to the catalogue.
 */
export function createExternalSession(lead: ExternalLead, registry: StepRegistry): SurveySession {
  const known = new Set(registry.answerKeys());
  const unknown = Object.keys(lead.answers).filter(key => !known.has(key));
  if (unknown.length > 0) {
    throw new UnknownAnswerKeyError(unknown);
  }

  const answers: Record<string, string> = {};
  for (const [key, value] of Object.entries(lead.answers)) {
    if (value.trim()) answers[key] = value.trim();
  }

  const timestamp = (lead.completedAt ?? new Date()).toISOString();
  const history = registry.steps()
    .filter(step => step.answerKey !== undefined && answers[step.answerKey] !== undefined)
    .map(step => step.id);

  return {
    userId: lead.userId,
    currentStep: COMPLETE,
    answers,
    language: lead.language ?? 'ru',
    history,
    selection: [],
    profile: lead.profile ?? { username: null, displayName: null },
    source: 'website',
    createdAt: timestamp,
    lastActivityAt: timestamp,
    completedAt: timestamp,
  };
}
