/**
 * Translator - string tables for rendered cards
 *
 * Locale files are `i18n/<tag>.json`, nested objects addressed by dotted
 * keys. A missing translation falls back to the default language, then to
 * the raw key. Placeholders look like `{name}`; unknown placeholders stay
 * as written.
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { DEFAULT_LANGUAGE, isLanguage, type Language } from './languages.js';

type LocaleTree = { [key: string]: string | LocaleTree };

/** Numerals by language, from i18n/numerals.json */
type NumeralTable = Partial<Record<Language, string[]>>;

// Sources load from src/i18n, compiled output from dist/src/i18n
const I18N_CANDIDATES = ['../../i18n/', '../../../i18n/'].map((relative) =>
  fileURLToPath(new URL(relative, import.meta.url))
);

export const DEFAULT_I18N_DIR = I18N_CANDIDATES.find((dir) => existsSync(dir)) ?? I18N_CANDIDATES[0];

const NUMERALS_FILE = 'numerals.json';

function isLocaleTree(value: unknown): value is LocaleTree {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every((child) => typeof child === 'string' || isLocaleTree(child));
}

function isNumeralTable(value: unknown): value is NumeralTable {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.entries(value).every(
    ([lang, numerals]) =>
      isLanguage(lang) && Array.isArray(numerals) && numerals.every((n) => typeof n === 'string')
  );
}

function walk(tree: LocaleTree, key: string): string | null {
  let node: string | LocaleTree | undefined = tree;
  for (const part of key.split('.')) {
    if (node === undefined || typeof node === 'string') {
      return null;
    }
    node = node[part];
  }
  return typeof node === 'string' ? node : null;
}

function format(text: string, params: Record<string, string | number>): string {
  return text.replace(/\{(\w+)\}/g, (placeholder, name: string) =>
    name in params ? String(params[name]) : placeholder
  );
}

export class Translator {
  private locales: Map<Language, LocaleTree> = new Map();
  private numerals: NumeralTable = {};

  constructor(private defaultLanguage: Language = DEFAULT_LANGUAGE) {}

  /**
   * Load every locale file of a directory
   *
   * @throws {Error} If a file is not valid JSON or not a string tree
   */
  static fromDirectory(dir: string = DEFAULT_I18N_DIR, verbose: boolean = false): Translator {
    const translator = new Translator();

    for (const file of readdirSync(dir)) {
      if (!file.endsWith('.json')) continue;

      const data: unknown = JSON.parse(readFileSync(join(dir, file), 'utf8'));

      if (file === NUMERALS_FILE) {
        if (!isNumeralTable(data)) {
          throw new Error(`Invalid numeral table: ${file}`);
        }
        translator.numerals = data;
        continue;
      }

      const tag = file.slice(0, -'.json'.length);
      if (!isLanguage(tag)) {
        console.warn(`I18n: Skipping ${file}, not a supported language`);
        continue;
      }
      if (!isLocaleTree(data)) {
        throw new Error(`Invalid locale file: ${file}`);
      }

      translator.load(tag, data);
      if (verbose) {
        console.log(`I18n: Loaded ${tag}`);
      }
    }

    return translator;
  }

  /**
   * Merge a string tree into a language
   */
  load(lang: Language, data: LocaleTree): void {
    const existing = this.locales.get(lang) ?? {};
    this.locales.set(lang, { ...existing, ...data });
  }

  t(key: string, lang: Language, params: Record<string, string | number> = {}): string {
    const tree = this.locales.get(lang);
    let text = tree ? walk(tree, key) : null;

    if (text === null && lang !== this.defaultLanguage) {
      const fallback = this.locales.get(this.defaultLanguage);
      text = fallback ? walk(fallback, key) : null;
    }

    return format(text ?? key, params);
  }

  /**
   * Language-specific numeral for 1..10, Latin numerals otherwise
   */
  numeral(n: number, lang: Language): string {
    const table = this.numerals[lang] ?? this.numerals['en-US'];
    return table?.[n - 1] ?? String(n);
  }

  languages(): Language[] {
    return Array.from(this.locales.keys());
  }

  clear(): void {
    this.locales.clear();
    this.numerals = {};
  }
}
