import type { Row } from './types.js';

export const HEADING_KEYWORDS: ReadonlySet<string> = new Set([
  'education',
  'skills',
  'projects',
  'experience',
  'work experience',
  'certifications',
  'summary',
  'objective',
  'profile',
  'contact',
]);

const UPPERCASE_RATIO = 0.7;
const MIN_HEADING_LENGTH = 3;
const MAX_HEADING_LENGTH = 64;

const LETTER_RE = /\p{L}/u;
const UPPERCASE_RE = /\p{Lu}/u;

export function isHeading(rawText: string): boolean {
  const text = rawText.trim();
  if (!text) return false;

  const chars = Array.from(text);
  const letters = chars.filter((c) => LETTER_RE.test(c));
  if (letters.length === 0) return false;

  const upper = letters.filter((c) => UPPERCASE_RE.test(c)).length;
  if (
    upper / letters.length >= UPPERCASE_RATIO
    && chars.length >= MIN_HEADING_LENGTH
    && chars.length <= MAX_HEADING_LENGTH
  ) {
    return true;
  }

  return HEADING_KEYWORDS.has(text.toLowerCase());
}

/**
 * Splits one page's rows into groups. The first row always opens a group so
 * nothing before the first heading is lost; each later heading opens another.
 */
export function groupRows(rows: readonly Row[]): string[][] {
  const groups: string[][] = [];
  let current: string[] | null = null;

  for (const row of rows) {
    if (current === null || isHeading(row.text)) {
      current = [row.text];
      groups.push(current);
    } else {
      current.push(row.text);
    }
  }

  return groups;
}
