// src/routes/ingest.ts
// Document ingestion endpoint.
// - POST /ingest/document - Chunk, embed, index and extract a plain-text document

import type { FastifyInstance } from "fastify";
import type { AppServices } from "../services";
import { InvalidInputError } from "../knowledge/errors";
import { decodeFileContent, ingestDocument } from "../knowledge/ingest";
import { getRateLimitConfig } from "../middleware/rateLimit";
import { getRequestLogger } from "../observability/requestLogger";

/* ---------- Types ---------- */

interface IngestBody {
  file_name?: unknown;
  file_content?: unknown;
  file_type?: unknown;
}

const SUPPORTED_FILE_TYPES = ["txt", "text"];

/* ---------- Route Registration ---------- */

export function createIngestRoutes(services: AppServices) {
  return async function ingestRoutes(app: FastifyInstance) {
    /**
     * POST /ingest/document
     * Body: { file_name, file_content (base64 or raw text), file_type }
     */
    app.post<{ Body: IngestBody }>(
      "/ingest/document",
      getRateLimitConfig("ingest"),
      async (req, reply) => {
        const body = req.body;
        const fileName = body?.file_name;
        const fileContent = body?.file_content;
        const fileType = body?.file_type;

        if (typeof fileName !== "string" || fileName.trim().length === 0) {
          return reply.code(400).send({ error: "invalid_input", message: "file_name is required" });
        }
        if (typeof fileContent !== "string") {
          return reply.code(400).send({ error: "invalid_input", message: "file_content is required" });
        }
        if (typeof fileType !== "string" || !SUPPORTED_FILE_TYPES.includes(fileType.toLowerCase())) {
          return reply.code(415).send({
            error: "unsupported_file_type",
            message: `file_type must be one of: ${SUPPORTED_FILE_TYPES.join(", ")}`,
          });
        }

        const text = decodeFileContent(fileContent);

        try {
          const result = await ingestDocument(
            { fileName: fileName.trim(), fileType: fileType.toLowerCase(), text },
            {
              embeddings: services.embeddings,
              vectorIndex: services.vectorIndex,
              graphStore: services.graphStore,
              documents: services.documents,
              chunking: services.chunking,
              logger: getRequestLogger(req),
            }
          );

          return reply.code(200).send({
            success: true,
            document_id: result.documentId,
            chunks_created: result.chunksCreated,
            entities_extracted: result.entitiesExtracted,
            relations_extracted: result.relationsExtracted,
            message: `Document ${fileName.trim()} ingested successfully`,
          });
        } catch (err) {
          if (err instanceof InvalidInputError) {
            return reply.code(400).send({ error: "invalid_input", message: err.message });
          }
          throw err;
        }
      }
    );
  };
}
