import { Locale } from '../dialogue/types';

const VIETNAMESE_MARKS = /[àáảãạăằắẳẵặâầấẩẫậèéẻẽẹêềếểễệìíỉĩịòóỏõọôồốổỗộơờớởỡợùúủũụưừứửữựỳýỷỹỵđ]/u;
const LATIN_LETTER = /[a-z]/;

/** NFC, lower-case, single spaces. Every matcher works on this form. */
export function normalizeText(text: string): string {
  return text.normalize('NFC').toLowerCase().replace(/\s+/g, ' ').trim();
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Alternation of literal phrases, longest first so longer phrases win at a position. */
export function phraseAlternation(phrases: readonly string[]): string {
  return [...new Set(phrases.map((p) => normalizeText(p)))]
    .filter((p) => p.length > 0)
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
}

/**
 * Wrap a pattern so it only matches on whole words. `\b` only knows ASCII
 * word characters, so Vietnamese letters need explicit letter lookarounds.
 */
export function wordBounded(source: string, flags = 'u'): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}])(?:${source})(?![\\p{L}\\p{N}])`, flags);
}

export function phraseRegex(phrases: readonly string[], flags = 'u'): RegExp {
  return wordBounded(phraseAlternation(phrases), flags);
}

/** Returns the locale a text is written in, or null if it cannot tell. */
export function detectLocale(text: string): Locale | null {
  const normalized = normalizeText(text);
  if (VIETNAMESE_MARKS.test(normalized)) return 'vi';
  if (LATIN_LETTER.test(normalized)) return 'en';
  return null;
}

export function tokenize(normalized: string): string[] {
  return normalized.split(' ').filter((t) => t.length > 0);
}
