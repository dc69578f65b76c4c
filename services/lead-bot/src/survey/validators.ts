/**
 * Валидаторы свободного ввода. Закрытый набор: шаги ссылаются на них по имени,
 * все функции чистые (одинаковый ввод → одинаковый результат).
 */

import { isValidPhoneNumber, normalizePhoneNumber } from '../lib/phoneNormalization.js';
import type { ValidationResult, ValidatorName } from './types.js';

export const MAX_NAME_LENGTH = 50;
export const MAX_TEXT_LENGTH = 1000;

const NAME_PATTERN = /^[а-яёa-z\s\-']+$/i;

/**
 * Убирает теги, управляющие символы и лишние пробелы
 */
export function sanitizeText(text: string): string {
  return text
    .replace(/<script[\s\S]*?<\/script>/gi, '')
    .replace(/<[^>]+>/g, '')
    .replace(/[\u0000-\u0009\u000b-\u001f\u007f-\u009f]/g, ' ')
    .replace(/[ \t]+/g, ' ')
    .replace(/\n+/g, '\n')
    .trim();
}

export function validateName(raw: string): ValidationResult {
  const name = raw.trim().replace(/\s+/g, ' ');

  if (!name) {
    return { ok: false, reasonKey: 'validation.name_required' };
  }
  if (name.length < 2) {
    return { ok: false, reasonKey: 'validation.name_too_short' };
  }
  if (name.length > MAX_NAME_LENGTH) {
    return { ok: false, reasonKey: 'validation.name_too_long', params: { max: MAX_NAME_LENGTH } };
  }
  if (!NAME_PATTERN.test(name)) {
    return { ok: false, reasonKey: 'validation.name_invalid' };
  }

  return { ok: true, value: name };
}

export function validatePhone(raw: string): ValidationResult {
  if (!raw.trim()) {
    return { ok: false, reasonKey: 'validation.phone_required' };
  }

  const normalized = normalizePhoneNumber(raw);
  if (!isValidPhoneNumber(normalized)) {
    return { ok: false, reasonKey: 'validation.phone_invalid' };
  }

  return { ok: true, value: normalized };
}

export function validateText(raw: string): ValidationResult {
  const text = sanitizeText(raw);

  if (!text) {
    return { ok: false, reasonKey: 'validation.text_required' };
  }
  if (text.length > MAX_TEXT_LENGTH) {
    return { ok: false, reasonKey: 'validation.text_too_long', params: { max: MAX_TEXT_LENGTH } };
  }

  return { ok: true, value: text };
}

export const VALIDATORS: Record<ValidatorName, (raw: string) => ValidationResult> = {
  name: validateName,
  phone: validatePhone,
  text: validateText,
};
