// src/knowledge/ingest.ts
// Document ingestion: chunk → embed → index → extract → graph write → record.

import { nanoid } from "nanoid";
import { createLogger, type Logger } from "../observability/logger";
import type { DocumentsStore } from "../store/documents";
import { chunkText, type ChunkingOptions } from "./chunking";
import { EntityExtractor } from "./entityExtractor";
import { InvalidInputError } from "./errors";
import type { EmbeddingCapability, GraphStore, GraphWriteResult, VectorIndex } from "./types";

/* ============= Types ============= */

export interface IngestDeps {
  embeddings: EmbeddingCapability;
  vectorIndex: VectorIndex;
  graphStore: GraphStore;
  documents: DocumentsStore;
  chunking: ChunkingOptions;
  logger?: Logger;
}

export interface IngestInput {
  fileName: string;
  fileType: string;
  text: string;
}

export interface IngestResult {
  documentId: string;
  chunksCreated: number;
  entitiesExtracted: number;
  relationsExtracted: number;
}

const defaultLogger = createLogger("knowledge:ingest");

/* ============= Main Entry Point ============= */

export async function ingestDocument(input: IngestInput, deps: IngestDeps): Promise<IngestResult> {
  if (!input.text.trim()) {
    throw new InvalidInputError("Document contains no text");
  }

  const log = deps.logger ?? defaultLogger;
  const documentId = nanoid(12);
  const chunks = chunkText(input.text, deps.chunking);
  const extraction = EntityExtractor.extract(input.text);

  // Embed everything before the first write
  const vectors: number[][] = [];
  for (const chunk of chunks) {
    vectors.push(await deps.embeddings.embed(chunk.text));
  }

  let written: GraphWriteResult;
  try {
    for (const [index, chunk] of chunks.entries()) {
      await deps.vectorIndex.upsert(
        { id: `${documentId}_chunk_${index}`, documentId, text: chunk.text, offset: chunk.offset },
        vectors[index]
      );
    }

    written = await deps.graphStore.write(documentId, extraction.entities, extraction.relations);

    await deps.documents.create({
      id: documentId,
      fileName: input.fileName,
      fileType: input.fileType,
      chunkCount: chunks.length,
      entityCount: written.entitiesWritten,
      relationCount: written.relationsWritten,
    });
  } catch (err) {
    // Chunks without a document record would still be searchable
    await deps.vectorIndex.deleteByDocument(documentId).catch((cleanupErr: unknown) => {
      log.error({ documentId, err: cleanupErr }, "Failed to remove chunks of a failed ingest");
    });
    log.warn({ documentId, fileName: input.fileName, err }, "Document ingest failed");
    throw err;
  }

  log.info(
    {
      documentId,
      fileName: input.fileName,
      chunks: chunks.length,
      entities: written.entitiesWritten,
      relations: written.relationsWritten,
    },
    "Document ingested"
  );

  return {
    documentId,
    chunksCreated: chunks.length,
    entitiesExtracted: written.entitiesWritten,
    relationsExtracted: written.relationsWritten,
  };
}

/* ============= Content Decoding ============= */

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;
const INLINE_SPACE = /[ \t]/;
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/;
const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * File content arrives base64-encoded or as raw text. Base64 may be wrapped
 * across lines but never has spaces inside a line. It is decoded only when
 * the bytes are UTF-8 text without control characters; anything else is
 * taken as-is.
 */
export function decodeFileContent(content: string): string {
  const trimmed = content.trim();
  if (INLINE_SPACE.test(trimmed)) return content;

  const compact = trimmed.replace(/\r?\n/g, "");
  if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64.test(compact)) {
    return content;
  }

  let decoded: string;
  try {
    decoded = utf8.decode(Buffer.from(compact, "base64"));
  } catch {
    return content;
  }
  return CONTROL_CHARS.test(decoded) ? content : decoded;
}
