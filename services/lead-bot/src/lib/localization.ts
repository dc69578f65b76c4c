import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { createLogger } from './logger.js';

const log = createLogger({ module: 'localization' });

export type Dictionary = Record<string, string>;
export type TranslateParams = Record<string, string | number>;

// Fixed tail of the fallback chain; the requested language is tried first.
const FALLBACK_LANGUAGES = ['ru', 'en'] as const;

export const DEFAULT_LOCALES_DIR = fileURLToPath(new URL('../../locales/', import.meta.url));

export interface Localization {
  /** Resolves `key` for `lang`, falling back to ru, then en, then the key itself. */
  t(key: string, lang: string, params?: TranslateParams): string;
  /** Whether `lang` itself defines `key` (no fallback). */
  has(key: string, lang: string): boolean;
  languages(): string[];
}

function interpolate(text: string, params?: TranslateParams): string {
  if (!params) return text;
  return text.replace(/\{(\w+)\}/g, (match, name: string) => {
    const value = params[name];
    return value === undefined ? match : String(value);
  });
}

export function createLocalization(dictionaries: Record<string, Dictionary>): Localization {
  const locales = new Map<string, Dictionary>(Object.entries(dictionaries));

  const lookup = (key: string, lang: string): string | undefined => {
    const value = locales.get(lang)?.[key];
    return value ? value : undefined;
  };

  return {
    t(key, lang, params) {
      const text =
        lookup(key, lang) ??
        lookup(key, FALLBACK_LANGUAGES[0]) ??
        lookup(key, FALLBACK_LANGUAGES[1]) ??
        key;
      return interpolate(text, params);
    },
    has(key, lang) {
      return lookup(key, lang) !== undefined;
    },
    languages() {
      return [...locales.keys()];
    },
  };
}

function isDictionary(value: unknown): value is Dictionary {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every(v => typeof v === 'string')
  );
}

/**
 * Loads every `<lang>.json` from `dir`. A missing directory yields an empty
 * resolver (every lookup degrades to the key); a malformed file is fatal.
 */
export function loadLocales(dir: string = DEFAULT_LOCALES_DIR): Localization {
  const dictionaries: Record<string, Dictionary> = {};

  if (!fs.existsSync(dir)) {
    log.warn({ dir }, 'Locales directory not found');
    return createLocalization(dictionaries);
  }

  for (const filename of fs.readdirSync(dir)) {
    if (!filename.endsWith('.json')) continue;
    const lang = filename.slice(0, -'.json'.length);
    const raw: unknown = JSON.parse(fs.readFileSync(path.join(dir, filename), 'utf-8'));
    if (!isDictionary(raw)) {
      throw new Error(`Locale file ${filename} must be a flat object of strings`);
    }
    dictionaries[lang] = raw;
  }

  log.info({ dir, languages: Object.keys(dictionaries) }, 'Locales loaded');
  return createLocalization(dictionaries);
}
