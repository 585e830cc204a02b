/**
 * Keyword extraction for subtitle splits.
 */

import fs from 'fs';
import { fileURLToPath } from 'url';

const STOPWORDS_PATH = fileURLToPath(new URL('./data/stopwords.json', import.meta.url));

function loadStopwords(): ReadonlySet<string> {
  const raw: unknown = JSON.parse(fs.readFileSync(STOPWORDS_PATH, 'utf-8'));
  if (!Array.isArray(raw) || !raw.every((word): word is string => typeof word === 'string')) {
    throw new Error(`Stopword list at ${STOPWORDS_PATH} must be an array of strings`);
  }
  return new Set(raw.map(word => word.toLowerCase()));
}

export const STOPWORDS: ReadonlySet<string> = loadStopwords();

/**
 * Split text into words. HTML tags are dropped and every character other
 * than letters, digits, underscore, whitespace and `.,!?-` becomes a space,
 * so words keep their trailing punctuation.
 */
export function tokenizeText(text: string): string[] {
  const cleaned = text
    .replace(/<[^>]+>/g, '')
    .replace(/[^\p{L}\p{N}_\s.,!?-]/gu, ' ');

  return cleaned.split(/\s+/).filter(word => word.length > 0);
}

/**
 * Lower-case tokens stripped of punctuation, longer than two characters,
 * not stopwords, de-duplicated in first-seen order.
 */
export function extractKeywords(text: string, stopwords: ReadonlySet<string> = STOPWORDS): string[] {
  const keywords = new Set<string>();

  for (const word of tokenizeText(text.toLowerCase())) {
    const clean = word.replace(/[^\p{L}\p{N}_]/gu, '');
    if ([...clean].length > 2 && !stopwords.has(clean)) {
      keywords.add(clean);
    }
  }

  return [...keywords];
}
