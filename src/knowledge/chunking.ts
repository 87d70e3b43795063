// src/knowledge/chunking.ts
// Sentence-aware chunking with overlap.
//
// Chunks are exact slices of the source text, so `offset` always points at
// the chunk's first character. Sentences longer than the chunk size are cut
// into fixed windows.

export interface ChunkingOptions {
  /** Maximum characters per chunk */
  size: number;
  /** Characters of the previous chunk repeated at the start of the next */
  overlap: number;
}

export interface TextChunk {
  text: string;
  offset: number;
}

interface Span {
  start: number;
  end: number;
}

const SENTENCE_END = /[.!?]+(?=\s)/g;

function skipWhitespace(text: string, from: number): number {
  let i = from;
  while (i < text.length && /\s/.test(text[i])) i++;
  return i;
}

function trimEnd(text: string, start: number, end: number): number {
  let i = end;
  while (i > start && /\s/.test(text[i - 1])) i--;
  return i;
}

/** Sentence spans, whitespace excluded */
function sentenceSpans(text: string): Span[] {
  const spans: Span[] = [];
  let start = skipWhitespace(text, 0);

  for (const match of text.matchAll(SENTENCE_END)) {
    const end = (match.index ?? 0) + match[0].length;
    if (end <= start) continue;
    spans.push({ start, end });
    start = skipWhitespace(text, end);
  }

  const tail = trimEnd(text, start, text.length);
  if (tail > start) spans.push({ start, end: tail });
  return spans;
}

/** Cut spans longer than `size` into windows advancing by size - overlap */
function splitLongSpans(spans: Span[], size: number, overlap: number): Span[] {
  const step = Math.max(1, size - overlap);
  const out: Span[] = [];
  for (const span of spans) {
    if (span.end - span.start <= size) {
      out.push(span);
      continue;
    }
    for (let s = span.start; s < span.end; s += step) {
      out.push({ start: s, end: Math.min(span.end, s + size) });
      if (s + size >= span.end) break;
    }
  }
  return out;
}

export function chunkText(text: string, options: ChunkingOptions): TextChunk[] {
  const size = Math.max(1, Math.floor(options.size));
  const overlap = Math.min(Math.max(0, Math.floor(options.overlap)), size - 1);
  const spans = splitLongSpans(sentenceSpans(text), size, overlap);
  const chunks: TextChunk[] = [];

  let i = 0;
  while (i < spans.length) {
    const chunkStart = spans[i].start;
    let j = i;
    while (j + 1 < spans.length && spans[j + 1].end - chunkStart <= size) j++;
    const chunkEnd = spans[j].end;

    chunks.push({ text: text.slice(chunkStart, chunkEnd), offset: chunkStart });
    if (j + 1 >= spans.length) break;

    // Back up over whole sentences that fall inside the overlap window
    let k = j + 1;
    while (k - 1 > i && spans[k - 1].start >= chunkEnd - overlap) k--;
    i = k;
  }

  return chunks;
}
