/**
 * Search Query Generator
 *
 * Ranked image-search queries for a split's keywords.
 */

const MAX_QUERIES = 5;
const EMPTY_QUERY = 'abstract art';
const FALLBACK_QUERIES = ['nature', 'landscape', 'abstract'];

/**
 * Queries in order of preference:
 * 1. up to three keywords longer than 3 characters, longest first
 * 2. pairs from the first keywords (i < 2, j < 4)
 * At most five are returned.
 */
export function generateSearchQueries(keywords: readonly string[]): string[] {
  if (keywords.length === 0) {
    return [EMPTY_QUERY];
  }

  // sort is stable, so equal lengths keep keyword order
  const important = keywords
    .filter(keyword => keyword.length > 3)
    .sort((a, b) => b.length - a.length);

  const queries = important.slice(0, 3);

  if (keywords.length >= 2) {
    for (let i = 0; i < Math.min(2, keywords.length); i++) {
      for (let j = i + 1; j < Math.min(4, keywords.length); j++) {
        queries.push(`${keywords[i]} ${keywords[j]}`);
      }
    }
  }

  if (queries.length === 0) {
    return [...FALLBACK_QUERIES];
  }

  return queries.slice(0, MAX_QUERIES);
}

/**
 * All keywords as one query, for a single combined search.
 */
export function combinedQuery(keywords: readonly string[]): string {
  return keywords.length > 0 ? keywords.join(' ') : EMPTY_QUERY;
}
