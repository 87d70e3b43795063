// src/knowledge/entityExtractor.ts
// Heuristic entity and relation extraction for ingestion.
//
// Entities are capitalized word runs with a guessed type. Relations come from
// a few fixed phrasings and are kept only when both ends were extracted as
// entities.

import { normalizeEntityName, stripLeadingWords } from "./entityNames";
import type { EntityInput, RelationInput } from "./types";

/* ============= Constants ============= */

const MAX_ENTITIES = 50;
const MIN_ENTITY_LENGTH = 3;

const NAME = String.raw`[A-Z][a-z]+(?:[ \t]+[A-Z][a-z]+)*`;
const CAPITALIZED_SPAN = new RegExp(String.raw`\b${NAME}\b`, "g");

const RELATION_PATTERNS: ReadonlyArray<{ type: string; pattern: RegExp }> = [
  {
    type: "WORKS_AT",
    pattern: new RegExp(String.raw`(${NAME})\s+(?:works|worked|working|work)\s+(?:at|for)\s+(${NAME})`, "g"),
  },
  {
    type: "CEO_OF",
    pattern: new RegExp(
      String.raw`(${NAME})(?:,|\s+is|\s+was)\s+(?:the\s+)?(?:CEO|chief executive officer)\s+of\s+(${NAME})`,
      "g"
    ),
  },
  {
    type: "LOCATED_IN",
    pattern: new RegExp(
      String.raw`(${NAME})(?:,|\s+is|\s+was|\s+are)?\s+(?:located|based|headquartered)\s+in\s+(${NAME})`,
      "g"
    ),
  },
];

const ORGANIZATION_WORDS = ["inc", "corp", "corporation", "company", "ltd", "llc", "organization", "university", "college", "school", "institute", "bank", "group"];
const LOCATION_WORDS = ["city", "country", "state", "nation", "republic", "county", "province", "island"];

/* ============= Types ============= */

export interface ExtractionResult {
  entities: EntityInput[];
  relations: RelationInput[];
}

/* ============= Entity Typing ============= */

function guessEntityType(name: string): string {
  const words = name.toLowerCase().split(/\s+/);
  if (words.some((w) => ORGANIZATION_WORDS.includes(w))) return "Organization";
  if (words.some((w) => LOCATION_WORDS.includes(w))) return "Location";
  if (words.length === 2) return "Person";
  return "Entity";
}

/* ============= Extraction ============= */

function extractEntities(text: string): EntityInput[] {
  const entities: EntityInput[] = [];
  const seen = new Set<string>();

  for (const match of text.matchAll(CAPITALIZED_SPAN)) {
    const name = stripLeadingWords(match[0]);
    if (name.length < MIN_ENTITY_LENGTH) continue;

    const key = normalizeEntityName(name);
    if (seen.has(key)) continue;
    seen.add(key);
    entities.push({ name, type: guessEntityType(name) });

    if (entities.length >= MAX_ENTITIES) break;
  }

  return entities;
}

function extractRelations(text: string, entities: readonly EntityInput[]): RelationInput[] {
  const known = new Set(entities.map((e) => normalizeEntityName(e.name)));
  const relations: RelationInput[] = [];
  const seen = new Set<string>();

  for (const { type, pattern } of RELATION_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const source = stripLeadingWords(match[1]);
      const target = stripLeadingWords(match[2]);
      const sourceKey = normalizeEntityName(source);
      const targetKey = normalizeEntityName(target);
      if (!known.has(sourceKey) || !known.has(targetKey) || sourceKey === targetKey) continue;

      const key = `${sourceKey}|${type}|${targetKey}`;
      if (seen.has(key)) continue;
      seen.add(key);
      relations.push({ source, target, relationType: type });
    }
  }

  return relations;
}

function extractEntitiesAndRelations(text: string): ExtractionResult {
  const entities = extractEntities(text);
  return { entities, relations: extractRelations(text, entities) };
}

/* ============= Export ============= */

export const EntityExtractor = {
  extract: extractEntitiesAndRelations,
  // Exposed for testing
  guessEntityType,
  extractEntities,
  extractRelations,
};
