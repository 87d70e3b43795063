// src/store/chunks.ts
// Chunk storage and brute-force cosine search.
//
// Tables: chunks

import type { DbAdapter } from "../db/types";
import type { Chunk, VectorHit, VectorIndex } from "../knowledge/types";
import { VectorRetriever } from "../knowledge/vectorRetriever";
import { parseNumberArray } from "./rows";

/* ---------- Types ---------- */

// Row type (snake_case, matches DB)
interface ChunkRow {
  id: string;
  document_id: string;
  text: string;
  char_offset: number;
  embedding_json: string;
  created_at: number;
}

/* ---------- Row to Domain Converters ---------- */

function rowToChunk(row: ChunkRow): Chunk {
  return {
    id: row.id,
    documentId: row.document_id,
    text: row.text,
    embedding: parseNumberArray(row.embedding_json),
    offset: row.char_offset,
  };
}

/* ---------- Similarity ---------- */

/**
 * Cosine similarity clamped to [0, 1]. Vectors of different length or with
 * zero norm score 0. On unit vectors this equals 1 - d²/2.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;

  const cosine = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  return Number.isFinite(cosine) ? Math.min(1, Math.max(0, cosine)) : 0;
}

/* ---------- Store ---------- */

export class SqliteVectorIndex implements VectorIndex {
  constructor(private readonly db: DbAdapter) {}

  async search(vector: number[], k: number): Promise<VectorHit[]> {
    if (k <= 0) return [];
    const rows = await this.db.queryAll<ChunkRow>(`SELECT * FROM chunks`);
    return rows
      .map((row) => {
        const chunk = rowToChunk(row);
        return { chunk, score: cosineSimilarity(vector, chunk.embedding) };
      })
      .sort(VectorRetriever.compareHits)
      .slice(0, k);
  }

  async upsert(chunk: Omit<Chunk, "embedding">, vector: number[]): Promise<void> {
    await this.db.run(
      `INSERT INTO chunks (id, document_id, text, char_offset, embedding_json, created_at)
       VALUES (?, ?, ?, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET
         document_id = excluded.document_id,
         text = excluded.text,
         char_offset = excluded.char_offset,
         embedding_json = excluded.embedding_json`,
      [chunk.id, chunk.documentId, chunk.text, chunk.offset, JSON.stringify(vector), Date.now()]
    );
  }

  async deleteByDocument(documentId: string): Promise<number> {
    const result = await this.db.run(`DELETE FROM chunks WHERE document_id = ?`, [documentId]);
    return result.changes;
  }

  async count(): Promise<number> {
    const row = await this.db.queryOne<{ count: number }>(`SELECT COUNT(*) AS count FROM chunks`);
    return row?.count ?? 0;
  }
}
