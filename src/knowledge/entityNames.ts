// src/knowledge/entityNames.ts
// Entity name normalization and seed extraction from questions.

/* ============= Constants ============= */

const MAX_SEEDS = 10;
const MIN_SEED_LENGTH = 3;

/** Capitalized word runs: "John Smith", "Tech Corp" */
const CAPITALIZED_SPAN = /\b[A-Z][a-z]+(?:\s+[A-Z][a-z]+)*\b/g;

/** Sentence-initial words that are capitalized only by position */
const LEADING_WORDS = new Set([
  "What", "Who", "Whom", "Whose", "Where", "When", "Why", "How", "Which",
  "Does", "Do", "Did", "Is", "Are", "Was", "Were", "Can", "Could", "Should",
  "Would", "Will", "Has", "Have", "Had", "Tell", "List", "Name", "Describe",
  "Explain", "Compare", "The", "A", "An", "In", "On", "At", "Of", "For",
]);

/* ============= Normalization ============= */

/** Matching key for entity names: trimmed, lowercased, single-spaced */
export function normalizeEntityName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, " ");
}

/* ============= Seed Extraction ============= */

/** Drop sentence-initial question and stop words from a capitalized span */
export function stripLeadingWords(span: string): string {
  const words = span.split(/\s+/);
  while (words.length > 0 && LEADING_WORDS.has(words[0])) {
    words.shift();
  }
  return words.join(" ");
}

/**
 * Candidate entity names mentioned in a question, in order of appearance.
 * "Where does John Smith work?" → ["John Smith"]
 */
export function extractSeedEntities(question: string): string[] {
  const seeds: string[] = [];
  const seen = new Set<string>();

  for (const match of question.matchAll(CAPITALIZED_SPAN)) {
    const span = stripLeadingWords(match[0]);
    if (span.length < MIN_SEED_LENGTH) continue;

    const key = normalizeEntityName(span);
    if (seen.has(key)) continue;
    seen.add(key);
    seeds.push(span);

    if (seeds.length >= MAX_SEEDS) break;
  }

  return seeds;
}

/* ============= Name Mentions ============= */

const MAX_MENTION_WORDS = 4;
const MAX_QUESTION_WORDS = 64;

/**
 * Normalized runs of one to four consecutive words, the keys a stored entity
 * name would have if the question mentions it in any casing.
 * "how is john smith related?" → ["how", "how is", ..., "john smith", ...]
 */
export function mentionCandidates(text: string): string[] {
  const words = normalizeEntityName(text)
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean)
    .slice(0, MAX_QUESTION_WORDS);

  const candidates = new Set<string>();
  for (let start = 0; start < words.length; start++) {
    for (let len = 1; len <= MAX_MENTION_WORDS && start + len <= words.length; len++) {
      const candidate = words.slice(start, start + len).join(" ");
      if (candidate.length >= MIN_SEED_LENGTH) candidates.add(candidate);
    }
  }
  return [...candidates];
}

/** Append `extra` names to `seeds`, skipping normalized duplicates, up to the seed cap */
export function mergeSeedNames(seeds: readonly string[], extra: readonly string[]): string[] {
  const merged: string[] = [];
  const seen = new Set<string>();
  for (const name of [...seeds, ...extra]) {
    const key = normalizeEntityName(name);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    merged.push(name);
    if (merged.length >= MAX_SEEDS) break;
  }
  return merged;
}
