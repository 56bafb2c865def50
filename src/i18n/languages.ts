/**
 * Supported languages
 *
 * The public tag is what clients send in `lang`; each upstream service
 * expects its own code for the same language.
 */

export const LANGUAGES = [
  'zh-TW',
  'zh-CN',
  'de-DE',
  'en-US',
  'es-ES',
  'fr-FR',
  'id-ID',
  'ja-JP',
  'ko-KR',
  'pt-PT',
  'ru-RU',
  'th-TH',
  'vi-VN',
] as const;

export type Language = (typeof LANGUAGES)[number];

export const DEFAULT_LANGUAGE: Language = 'en-US';

const MIHOMO_LANGUAGES: Record<Language, string> = {
  'zh-TW': 'cht',
  'zh-CN': 'cn',
  'de-DE': 'de',
  'en-US': 'en',
  'es-ES': 'es',
  'fr-FR': 'fr',
  'id-ID': 'id',
  'ja-JP': 'jp',
  'ko-KR': 'kr',
  'pt-PT': 'pt',
  'ru-RU': 'ru',
  'th-TH': 'th',
  'vi-VN': 'vi',
};

export function isLanguage(value: string): value is Language {
  return LANGUAGES.some((lang) => lang === value);
}

/** HoYoLAB takes the lowercased tag, e.g. `en-us` */
export function toHoyolabLanguage(lang: Language): string {
  return lang.toLowerCase();
}

export function toMihomoLanguage(lang: Language): string {
  return MIHOMO_LANGUAGES[lang];
}
