// Text-only signals that keep paragraph text and stray fragments out of the outline.

const FUNCTION_WORDS = /\b(the|and|to|of|in|for|with|that|is|are|was|will|be)\b/i;

export const wordCount = (text: string): number => text.trim().split(/\s+/).filter((w) => w.length > 0).length;

export const hasLetters = (text: string): boolean => /\p{L}/u.test(text);

export function isAllCaps(text: string): boolean {
  const letters = text.replace(/[^\p{L}]/gu, '');
  return letters.length >= 2 && letters === letters.toUpperCase() && letters !== letters.toLowerCase();
}

export const startsLowercase = (text: string): boolean => /^\p{Ll}/u.test(text.trim());

/** A long line that reads like running prose. */
export function isBodySentence(text: string, numbered: boolean): boolean {
  const s = text.trim();
  return s.length > 80 && !isAllCaps(s) && !numbered && FUNCTION_WORDS.test(s);
}

/** A short form-field label such as "Name:" or "Date of birth ____". */
export function isFieldLabel(text: string): boolean {
  const s = text.trim();
  if (s.length > 40) return false;
  return /:\s*$/.test(s) || /_{3,}/.test(s) || /\.{4,}/.test(s) || /_\s*$/.test(s);
}

export const isCopyrightNotice = (text: string): boolean => /\bcopyright\b|©/i.test(text);

export const isColonLabel = (text: string): boolean => /^[^:]{1,80}:$/.test(text.trim());

/** Case-folded text with digit runs replaced, so "Page 3" and "Page 12" compare equal. */
export function normalizeForRepetition(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim().replace(/\d+/g, '#');
}

/** Case-folded text with punctuation stripped, for comparing heading fragments. */
export function normalizeForComparison(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}
