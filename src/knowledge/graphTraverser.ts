// src/knowledge/graphTraverser.ts
// Bounded breadth-first expansion over the entity graph.
//
// Edges are followed in both directions; hop descriptions keep the stored
// direction. Only newly reached entities join the next frontier, so cycles
// cannot loop the traversal.

import { abortReason } from "./errors";
import { extractSeedEntities, mergeSeedNames, normalizeEntityName } from "./entityNames";
import type {
  Entity,
  GraphEntityHit,
  GraphHits,
  GraphRelationHit,
  GraphStore,
  Relation,
} from "./types";

/* ============= Constants ============= */

const MIN_SUBSTRING_SEED_LENGTH = 3;
const DEFAULT_MAX_ENTITIES = 10;

/* ============= Types ============= */

export interface TraverseOptions {
  /** Cap on entities reached, seeds included */
  maxEntities?: number;
  signal?: AbortSignal;
}

/* ============= Helpers ============= */

function relationKey(relation: Relation): string {
  return `${relation.sourceEntityId}|${relation.relationType}|${relation.targetEntityId}`;
}

function describeHop(source: Entity, relationType: string, target: Entity): string {
  return `${source.name} --[${relationType}]--> ${target.name}`;
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw abortReason(signal);
}

/**
 * Entities matching the seed names: exact normalized match first, then a
 * substring match for seeds long enough to make one meaningful.
 */
async function resolveSeeds(
  seedNames: readonly string[],
  store: GraphStore
): Promise<Entity[]> {
  const found = new Map<string, Entity>();

  for (const name of seedNames) {
    const normalized = normalizeEntityName(name);
    if (!normalized) continue;

    let matches = await store.matchEntities(normalized, { mode: "exact" });
    if (matches.length === 0 && normalized.length >= MIN_SUBSTRING_SEED_LENGTH) {
      matches = await store.matchEntities(normalized, { mode: "substring" });
    }

    for (const entity of matches) {
      if (!found.has(entity.id)) found.set(entity.id, entity);
    }
  }

  return [...found.values()];
}

/**
 * Seed names for a question: capitalized spans first, then stored entities
 * the question mentions in other casings ("how is john smith related?").
 */
async function seedsForQuestion(question: string, store: GraphStore): Promise<string[]> {
  const mentioned = await store.mentionedIn(question);
  return mergeSeedNames(
    extractSeedEntities(question),
    mentioned.map((entity) => entity.name)
  );
}

/* ============= Traversal ============= */

async function traverseGraph(
  seedNames: readonly string[],
  maxDepth: number,
  store: GraphStore,
  options: TraverseOptions = {}
): Promise<GraphHits> {
  const maxEntities = options.maxEntities ?? DEFAULT_MAX_ENTITIES;
  const { signal } = options;

  const entities: GraphEntityHit[] = [];
  const relations: GraphRelationHit[] = [];
  const traversalPath: string[] = [];

  const visited = new Map<string, Entity>();
  const seenRelations = new Set<string>();

  const seeds = (await resolveSeeds(seedNames, store)).slice(0, Math.max(0, maxEntities));
  for (const seed of seeds) {
    visited.set(seed.id, seed);
    entities.push({ entity: seed, depth: 0 });
  }

  let frontier = seeds;
  for (let depth = 1; depth <= maxDepth && frontier.length > 0; depth++) {
    const next: Entity[] = [];

    for (const current of frontier) {
      throwIfAborted(signal);
      const neighborhood = await store.neighbors(current.id);
      const known = new Map(neighborhood.entities.map((e) => [e.id, e]));
      known.set(current.id, current);

      for (const relation of neighborhood.relations) {
        const key = relationKey(relation);
        if (seenRelations.has(key)) continue;

        const otherId =
          relation.sourceEntityId === current.id ? relation.targetEntityId : relation.sourceEntityId;

        if (!visited.has(otherId)) {
          const other = known.get(otherId);
          if (!other || visited.size >= maxEntities) continue;
          visited.set(otherId, other);
          entities.push({ entity: other, depth });
          next.push(other);
        }

        const source = visited.get(relation.sourceEntityId);
        const target = visited.get(relation.targetEntityId);
        if (!source || !target) continue;

        seenRelations.add(key);
        relations.push({ relation, source, target, depth });
        traversalPath.push(describeHop(source, relation.relationType, target));
      }
    }

    frontier = next;
  }

  return { entities, relations, traversalPath };
}

/* ============= Export ============= */

export const GraphTraverser = {
  traverse: traverseGraph,
  seedsForQuestion,
  // Exposed for testing
  resolveSeeds,
  describeHop,
};
