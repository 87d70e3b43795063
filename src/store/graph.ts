// src/store/graph.ts
// Entity graph store: entities merged on normalized name, relations
// deduplicated on (source, type, target).
//
// Tables: entities, relations

import { nanoid } from "nanoid";
import type { DbAdapter } from "../db/types";
import { mentionCandidates, normalizeEntityName } from "../knowledge/entityNames";
import type {
  Entity,
  EntityInput,
  EntityMatchMode,
  GraphStats,
  GraphStore,
  GraphWriteResult,
  Relation,
  RelationInput,
} from "../knowledge/types";
import { mergeIds, parseStringArray } from "./rows";

const MAX_MENTIONED_ENTITIES = 50;

/* ---------- Types ---------- */

// Row types (snake_case, matches DB)
interface EntityRow {
  id: string;
  name: string;
  normalized_name: string;
  entity_type: string;
  source_document_ids_json: string;
  created_at: number;
}

interface RelationRow {
  id: string;
  source_entity_id: string;
  target_entity_id: string;
  relation_type: string;
  source_document_ids_json: string;
  created_at: number;
}

/* ---------- Row to Domain Converters ---------- */

function rowToEntity(row: EntityRow): Entity {
  return {
    id: row.id,
    name: row.name,
    type: row.entity_type,
    sourceDocumentIds: parseStringArray(row.source_document_ids_json),
  };
}

function rowToRelation(row: RelationRow): Relation {
  return {
    sourceEntityId: row.source_entity_id,
    targetEntityId: row.target_entity_id,
    relationType: row.relation_type,
    sourceDocumentIds: parseStringArray(row.source_document_ids_json),
  };
}

/* ---------- Store ---------- */

export class SqliteGraphStore implements GraphStore {
  constructor(private readonly db: DbAdapter) {}

  async matchEntities(name: string, opts: { mode?: EntityMatchMode } = {}): Promise<Entity[]> {
    const normalized = normalizeEntityName(name);
    if (!normalized) return [];

    const rows =
      opts.mode === "substring"
        ? await this.db.queryAll<EntityRow>(
            `SELECT * FROM entities WHERE instr(normalized_name, ?) > 0 ORDER BY normalized_name`,
            [normalized]
          )
        : await this.db.queryAll<EntityRow>(
            `SELECT * FROM entities WHERE normalized_name = ?`,
            [normalized]
          );
    return rows.map(rowToEntity);
  }

  async mentionedIn(text: string): Promise<Entity[]> {
    const candidates = mentionCandidates(text);
    if (candidates.length === 0) return [];

    const placeholders = candidates.map(() => "?").join(", ");
    const rows = await this.db.queryAll<EntityRow>(
      `SELECT * FROM entities WHERE normalized_name IN (${placeholders})
       ORDER BY normalized_name LIMIT ?`,
      [...candidates, MAX_MENTIONED_ENTITIES]
    );
    return rows.map(rowToEntity);
  }

  async neighbors(entityId: string): Promise<{ entities: Entity[]; relations: Relation[] }> {
    const relationRows = await this.db.queryAll<RelationRow>(
      `SELECT * FROM relations
       WHERE source_entity_id = ? OR target_entity_id = ?
       ORDER BY created_at, rowid`,
      [entityId, entityId]
    );

    const otherIds = [
      ...new Set(
        relationRows.map((r) => (r.source_entity_id === entityId ? r.target_entity_id : r.source_entity_id))
      ),
    ];
    if (otherIds.length === 0) return { entities: [], relations: [] };

    const placeholders = otherIds.map(() => "?").join(", ");
    const entityRows = await this.db.queryAll<EntityRow>(
      `SELECT * FROM entities WHERE id IN (${placeholders})`,
      otherIds
    );

    return { entities: entityRows.map(rowToEntity), relations: relationRows.map(rowToRelation) };
  }

  /**
   * Upsert a document's entities and relations in one transaction.
   * Relations whose endpoints cannot be resolved by name are skipped.
   */
  async write(
    documentId: string,
    entities: EntityInput[],
    relations: RelationInput[]
  ): Promise<GraphWriteResult> {
    return this.db.transaction(async (tx) => {
      const now = Date.now();
      const idByName = new Map<string, string>();
      let entitiesWritten = 0;
      let relationsWritten = 0;

      for (const input of entities) {
        const normalized = normalizeEntityName(input.name);
        if (!normalized || idByName.has(normalized)) continue;

        const existing = await tx.queryOne<EntityRow>(
          `SELECT * FROM entities WHERE normalized_name = ?`,
          [normalized]
        );
        if (existing) {
          const docIds = mergeIds(parseStringArray(existing.source_document_ids_json), [documentId]);
          await tx.run(`UPDATE entities SET source_document_ids_json = ? WHERE id = ?`, [
            JSON.stringify(docIds),
            existing.id,
          ]);
          idByName.set(normalized, existing.id);
        } else {
          const id = nanoid(12);
          await tx.run(
            `INSERT INTO entities (id, name, normalized_name, entity_type, source_document_ids_json, created_at)
             VALUES (?, ?, ?, ?, ?, ?)`,
            [id, input.name.trim(), normalized, input.type, JSON.stringify([documentId]), now]
          );
          idByName.set(normalized, id);
        }
        entitiesWritten++;
      }

      const resolve = async (name: string): Promise<string | undefined> => {
        const normalized = normalizeEntityName(name);
        const known = idByName.get(normalized);
        if (known) return known;
        const row = await tx.queryOne<{ id: string }>(
          `SELECT id FROM entities WHERE normalized_name = ?`,
          [normalized]
        );
        return row?.id;
      };

      for (const input of relations) {
        const sourceId = await resolve(input.source);
        const targetId = await resolve(input.target);
        if (!sourceId || !targetId) continue;

        const existing = await tx.queryOne<RelationRow>(
          `SELECT * FROM relations
           WHERE source_entity_id = ? AND relation_type = ? AND target_entity_id = ?`,
          [sourceId, input.relationType, targetId]
        );
        if (existing) {
          const docIds = mergeIds(parseStringArray(existing.source_document_ids_json), [documentId]);
          await tx.run(`UPDATE relations SET source_document_ids_json = ? WHERE id = ?`, [
            JSON.stringify(docIds),
            existing.id,
          ]);
        } else {
          await tx.run(
            `INSERT INTO relations (id, source_entity_id, target_entity_id, relation_type, source_document_ids_json, created_at)
             VALUES (?, ?, ?, ?, ?, ?)`,
            [nanoid(12), sourceId, targetId, input.relationType, JSON.stringify([documentId]), now]
          );
        }
        relationsWritten++;
      }

      return { entitiesWritten, relationsWritten };
    });
  }

  async stats(): Promise<GraphStats> {
    const entities = await this.db.queryOne<{ count: number }>(`SELECT COUNT(*) AS count FROM entities`);
    const relations = await this.db.queryOne<{ count: number }>(`SELECT COUNT(*) AS count FROM relations`);
    return { entities: entities?.count ?? 0, relations: relations?.count ?? 0 };
  }
}
