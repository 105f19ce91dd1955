/**
 * Language code helpers for the backends.
 */

/**
 * Vendors that want a full locale get ru-RU / en-US for bare or regional
 * Russian and English codes; anything else passes through.
 */
export function toRegionalLocale(code: string): string {
  const lower = code.trim().toLowerCase();
  if (lower.startsWith('ru')) return 'ru-RU';
  if (lower.startsWith('en')) return 'en-US';
  return code.trim();
}

/**
 * Primary subtag only ("en-US" -> "en"), as whisper.cpp expects.
 */
export function toPrimaryLanguage(code: string): string {
  const primary = code.trim().split(/[-_]/)[0] ?? '';
  return primary.toLowerCase() || 'auto';
}

export function isEnglish(code: string): boolean {
  return toPrimaryLanguage(code) === 'en';
}
