import { describe, expect, it } from 'vitest';
import { VALIDATORS, sanitizeText, validateName, validatePhone, validateText } from './validators.js';

describe('validateName', () => {
  it('accepts Cyrillic and Latin names with hyphen and apostrophe', () => {
    expect(validateName('  Анна-Мария  ')).toEqual({ ok: true, value: 'Анна-Мария' });
    expect(validateName("O'Brien   John")).toEqual({ ok: true, value: "O'Brien John" });
  });

  it('rejects blank, short, long and non-letter names', () => {
    expect(validateName('   ')).toEqual({ ok: false, reasonKey: 'validation.name_required' });
    expect(validateName('Я')).toEqual({ ok: false, reasonKey: 'validation.name_too_short' });
    expect(validateName('а'.repeat(51))).toEqual({
      ok: false,
      reasonKey: 'validation.name_too_long',
      params: { max: 50 },
    });
    expect(validateName('Anna 2')).toEqual({ ok: false, reasonKey: 'validation.name_invalid' });
  });
});

describe('validatePhone', () => {
  it('returns the normalized number', () => {
    expect(validatePhone('8 (999) 123-45-67')).toEqual({ ok: true, value: '+79991234567' });
  });

  it('distinguishes a missing number from an unreadable one', () => {
    expect(validatePhone('  ')).toEqual({ ok: false, reasonKey: 'validation.phone_required' });
    expect(validatePhone('12-34')).toEqual({ ok: false, reasonKey: 'validation.phone_invalid' });
  });
});

describe('validateText', () => {
  it('strips markup before checking', () => {
    expect(validateText('<b>IELTS</b> к лету<script>alert(1)</script>')).toEqual({ ok: true, value: 'IELTS к лету' });
    expect(validateText('<i></i>')).toEqual({ ok: false, reasonKey: 'validation.text_required' });
  });

  it('limits the length', () => {
    expect(validateText('x'.repeat(1001))).toEqual({
      ok: false,
      reasonKey: 'validation.text_too_long',
      params: { max: 1000 },
    });
  });
});

describe('sanitizeText', () => {
  it('collapses spaces and blank lines', () => {
    expect(sanitizeText('  one   two\n\n\nthree\t ')).toBe('one two\nthree');
  });
});

describe('VALIDATORS', () => {
  it('is deterministic for the same input', () => {
    for (const validate of Object.values(VALIDATORS)) {
      expect(validate('Тест 123')).toEqual(validate('Тест 123'));
    }
  });
});
