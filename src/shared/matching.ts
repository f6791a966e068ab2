/**
 * Keyword matching against a finite keyword table.
 *
 * Matching is a plain case-insensitive substring scan over whitespace-collapsed
 * text. There is no stemming, fuzzy matching or punctuation stripping.
 */

import { normalizeText } from './validation';

export interface KeywordEntry {
  key: string;
  keywords: string[];
}

export interface KeywordHit {
  key: string;
  keyword: string;
  position: number;
}

/**
 * Find every entry with at least one keyword in `text`.
 *
 * Hits are ordered by where the entry first appears in the text; entries that
 * appear at the same position keep their table order. Each entry is reported
 * once, with its earliest keyword.
 */
export function findKeywordHits(text: string, entries: KeywordEntry[]): KeywordHit[] {
  const haystack = normalizeText(text);
  if (!haystack) return [];

  const hits: Array<KeywordHit & { order: number }> = [];

  entries.forEach((entry, order) => {
    let best: KeywordHit | null = null;

    for (const keyword of entry.keywords) {
      const needle = normalizeText(keyword);
      if (!needle) continue;

      const position = haystack.indexOf(needle);
      if (position === -1) continue;

      if (!best || position < best.position) {
        best = { key: entry.key, keyword, position };
      }
    }

    if (best) {
      hits.push({ ...best, order });
    }
  });

  return hits
    .sort((a, b) => a.position - b.position || a.order - b.order)
    .map(({ key, keyword, position }) => ({ key, keyword, position }));
}

/**
 * Which of `keywords` occur anywhere in the given texts, in table order.
 */
export function findKeywords(texts: string[], keywords: string[]): string[] {
  const haystack = texts.map(normalizeText).join('\n');
  return keywords.filter((keyword) => {
    const needle = normalizeText(keyword);
    return needle.length > 0 && haystack.includes(needle);
  });
}
