// src/store/documents.ts
// Ingested document bookkeeping.
//
// Tables: documents

import type { DbAdapter } from "../db/types";

/* ---------- Types ---------- */

// Domain type (camelCase, for API)
export interface DocumentRecord {
  id: string;
  fileName: string;
  fileType: string;
  chunkCount: number;
  entityCount: number;
  relationCount: number;
  createdAt: string; // ISO string
}

// Row type (snake_case, matches DB)
interface DocumentRow {
  id: string;
  file_name: string;
  file_type: string;
  chunk_count: number;
  entity_count: number;
  relation_count: number;
  created_at: number;
}

export interface CreateDocumentInput {
  id: string;
  fileName: string;
  fileType: string;
  chunkCount: number;
  entityCount: number;
  relationCount: number;
}

/* ---------- Row to Domain Converters ---------- */

function rowToDocument(row: DocumentRow): DocumentRecord {
  return {
    id: row.id,
    fileName: row.file_name,
    fileType: row.file_type,
    chunkCount: row.chunk_count,
    entityCount: row.entity_count,
    relationCount: row.relation_count,
    createdAt: new Date(row.created_at).toISOString(),
  };
}

/* ---------- Store ---------- */

export class DocumentsStore {
  constructor(private readonly db: DbAdapter) {}

  async create(input: CreateDocumentInput): Promise<DocumentRecord> {
    const now = Date.now();
    await this.db.run(
      `INSERT INTO documents (id, file_name, file_type, chunk_count, entity_count, relation_count, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [input.id, input.fileName, input.fileType, input.chunkCount, input.entityCount, input.relationCount, now]
    );
    return { ...input, createdAt: new Date(now).toISOString() };
  }

  async getById(id: string): Promise<DocumentRecord | null> {
    const row = await this.db.queryOne<DocumentRow>(`SELECT * FROM documents WHERE id = ?`, [id]);
    return row ? rowToDocument(row) : null;
  }

  async count(): Promise<number> {
    const row = await this.db.queryOne<{ count: number }>(`SELECT COUNT(*) AS count FROM documents`);
    return row?.count ?? 0;
  }
}
