/**
 * Pattern Bank
 * Ordered category → RegExp table used by the regex detector.
 */

export type PatternCategory =
  | 'Email'
  | 'Phone'
  | 'SSN'
  | 'Credit Card'
  | 'Passport'
  | 'Canadian SIN';

export interface PatternEntry {
  category: PatternCategory;
  pattern: RegExp;
}

// Word characters, boundaries and digits follow Unicode, not ASCII:
// "José123456" has no boundary before the digits, and full-width digits count.
const WORD = String.raw`[\p{L}\p{N}_]`;
const B = `(?:(?<=${WORD})(?!${WORD})|(?<!${WORD})(?=${WORD}))`;
const D = String.raw`\p{Nd}`;

function unicode(source: string): RegExp {
  return new RegExp(source, 'gu');
}

// Passport and Credit Card over-match arbitrary tokens and digit runs. Keep their breadth.
const ENTRIES: PatternEntry[] = [
  { category: 'Email', pattern: unicode(String.raw`${B}[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Z|a-z]{2,}${B}`) },
  // +CC, (AAA), exchange, line; separators are space, dot or hyphen
  { category: 'Phone', pattern: unicode(String.raw`${B}(?:\+${D}{1,3}[-.\s]?)?\(?${D}{3}\)?[-.\s]?${D}{3}[-.\s]?${D}{4}${B}`) },
  { category: 'SSN', pattern: unicode(`${B}${D}{3}-${D}{2}-${D}{4}${B}`) },
  { category: 'Credit Card', pattern: unicode(`${B}(?:${D}[ -]*?){13,16}${B}`) },
  { category: 'Passport', pattern: unicode(`${B}[A-Z0-9]{6,9}${B}`) },
  { category: 'Canadian SIN', pattern: unicode(`${B}${D}{3}-${D}{3}-${D}{3}${B}`) },
];

export const PATTERN_BANK: readonly PatternEntry[] = Object.freeze(
  ENTRIES.map(entry => Object.freeze(entry)),
);

export function patternCategories(): PatternCategory[] {
  return PATTERN_BANK.map(e => e.category);
}

/**
 * All non-overlapping matches of one entry, left to right.
 * Works on a fresh RegExp so the shared pattern's lastIndex is never touched.
 */
export function matchAll(entry: PatternEntry, text: string): string[] {
  const regex = new RegExp(entry.pattern.source, entry.pattern.flags);
  return Array.from(text.matchAll(regex), m => m[0]);
}
