/**
 * Phone number normalization for leads coming from Telegram contacts,
 * typed replies and the website form.
 *
 * Handles:
 * - International format: +7 (999) 123-45-67
 * - Russian format with 8: 8 999 123 45 67
 * - Telegram contact format without plus: 79991234567
 * - Russian mobile without country code: 999 123 45 67
 *
 * @module phoneNormalization
 */

/**
 * Normalize a phone number to `+<digits>`.
 * Returns an empty string when the input cannot be read as a full number.
 *
 * @example
 * normalizePhoneNumber('+7 (999) 123-45-67') // '+79991234567'
 * normalizePhoneNumber('8 999 123 45 67') // '+79991234567'
 * normalizePhoneNumber('79991234567') // '+79991234567'
 * normalizePhoneNumber('abc') // ''
 */
export function normalizePhoneNumber(phone: string | null | undefined): string {
  if (!phone) {
    return '';
  }

  // Remove everything except digits and plus signs
  const cleaned = phone.replace(/[^\d+]/g, '');
  const hasPlus = cleaned.startsWith('+');
  const digits = cleaned.replace(/\+/g, '');

  if (!digits) {
    return '';
  }

  if (hasPlus) {
    return `+${digits}`;
  }

  // 8 999 123 45 67 → +79991234567
  if (digits.length === 11 && digits.startsWith('8')) {
    return `+7${digits.slice(1)}`;
  }

  // 79991234567 → +79991234567 (Telegram shares contacts this way)
  if (digits.length === 11 && digits.startsWith('7')) {
    return `+${digits}`;
  }

  // 999 123 45 67 → +79991234567
  if (digits.length === 10 && digits.startsWith('9')) {
    return `+7${digits}`;
  }

  return '';
}

/**
 * Minimal digit-count rule: `+` followed by 10–15 digits, and exactly
 * 11 digits for the +7 zone.
 */
export function isValidPhoneNumber(normalized: string): boolean {
  if (!/^\+\d{10,15}$/.test(normalized)) {
    return false;
  }
  if (normalized.startsWith('+7')) {
    return normalized.length === 12;
  }
  return true;
}

/**
 * Format phone number for display (Russian format)
 *
 * @example
 * formatPhoneNumber('+79991234567') // '+7 (999) 123-45-67'
 */
export function formatPhoneNumber(phone: string | null | undefined): string {
  const normalized = normalizePhoneNumber(phone);

  if (!normalized) {
    return phone ?? '';
  }

  const digits = normalized.slice(1);

  // Russian format: +7 (XXX) XXX-XX-XX
  if (digits.startsWith('7') && digits.length === 11) {
    return `+${digits[0]} (${digits.slice(1, 4)}) ${digits.slice(4, 7)}-${digits.slice(7, 9)}-${digits.slice(9)}`;
  }

  return normalized;
}
