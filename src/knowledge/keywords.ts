// src/knowledge/keywords.ts
// Keyword extraction shared by the confidence scorer and the dev provider.

import STOPWORD_LIST from "./data/stopwords.json";

const STOPWORDS: ReadonlySet<string> = new Set(STOPWORD_LIST);

/**
 * Significant keywords of `text`: lowercased, split on non-alphanumerics,
 * stop words and words shorter than 3 characters removed.
 */
export function extractKeywords(text: string): Set<string> {
  const words = text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((w) => w.length >= 3 && !STOPWORDS.has(w));

  return new Set(words);
}

/** Share of `subject` keywords that also appear in `reference` (0 when `subject` is empty) */
export function keywordCoverage(subject: Set<string>, reference: Set<string>): number {
  if (subject.size === 0) return 0;

  let found = 0;
  for (const word of subject) {
    if (reference.has(word)) found++;
  }
  return found / subject.size;
}
