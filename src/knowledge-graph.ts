// src/knowledge-graph.ts — Knowledge Graph
// Typed entities and relations extracted from a repository's documentation.
// Relations are unique by (source, type, target); entities are unique by id.

import { z } from "zod";
import type {
  Entity,
  EntityType,
  GraphStats,
  Relation,
  Warning,
} from "./types.js";
import { ENTITY_TYPES, RELATION_TYPES } from "./types.js";
import { NodeIdAllocator, quoteLabel } from "./mermaid.js";

// ─── Constants ───────────────────────────────────────────────────────────────

const MAX_NODES_PER_GROUP = 8;

// Architectural subgraph order, most important first
const GROUP_ORDER: readonly EntityType[] = [
  "project",
  "component",
  "feature",
  "framework",
  "technology",
  "language",
  "cloud_service",
  "platform",
  "database",
  "api_endpoint",
  "protocol",
  "configuration",
  "metric",
  "hardware",
  "person_org",
  "license",
  "prerequisite",
];

// ─── Serialized form ─────────────────────────────────────────────────────────

const EntitySchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  entityType: z.enum(ENTITY_TYPES),
  properties: z.record(z.unknown()).default({}),
  sourceSection: z.string().default(""),
  sourceText: z.string().default(""),
  confidence: z.number().min(0).max(1).default(1),
  extractionMethod: z.enum(["deterministic", "generative"]).default("deterministic"),
});

const RelationSchema = z.object({
  sourceId: z.string().min(1),
  targetId: z.string().min(1),
  relationType: z.enum(RELATION_TYPES),
  properties: z.record(z.unknown()).default({}),
  confidence: z.number().min(0).max(1).default(1),
  extractionMethod: z.enum(["deterministic", "generative"]).default("deterministic"),
});

export interface SerializedGraph {
  entities: Entity[];
  relations: Relation[];
}

export function relationKey(relation: Relation): string {
  return `${relation.sourceId}--${relation.relationType}-->${relation.targetId}`;
}

// ─── Graph ───────────────────────────────────────────────────────────────────

export class KnowledgeGraph {
  private readonly entityById = new Map<string, Entity>();
  private readonly relationByKey = new Map<string, Relation>();

  get entities(): Entity[] {
    return [...this.entityById.values()];
  }

  get relations(): Relation[] {
    return [...this.relationByKey.values()];
  }

  getEntity(id: string): Entity | undefined {
    return this.entityById.get(id);
  }

  entitiesOfType(entityType: EntityType): Entity[] {
    return this.entities.filter((e) => e.entityType === entityType);
  }

  relationsFrom(entityId: string): Relation[] {
    return this.relations.filter((r) => r.sourceId === entityId);
  }

  relationsTo(entityId: string): Relation[] {
    return this.relations.filter((r) => r.targetId === entityId);
  }

  /**
   * Entities one hop away in either direction.
   */
  neighbors(entityId: string): Entity[] {
    const connected = new Set<string>();
    for (const r of this.relationByKey.values()) {
      if (r.sourceId === entityId) connected.add(r.targetId);
      if (r.targetId === entityId) connected.add(r.sourceId);
    }
    connected.delete(entityId);
    return this.entities.filter((e) => connected.has(e.id));
  }

  addEntity(entity: Entity): boolean {
    if (this.entityById.has(entity.id)) return false;
    this.entityById.set(entity.id, entity);
    return true;
  }

  /**
   * Add a relation. Duplicates are ignored; relations whose endpoints are not
   * entities of this graph are dropped with a warning.
   */
  addRelation(relation: Relation, warnings: Warning[] = []): boolean {
    const key = relationKey(relation);
    if (this.relationByKey.has(key)) return false;
    const missing = [relation.sourceId, relation.targetId].filter(
      (id) => !this.entityById.has(id),
    );
    if (missing.length > 0) {
      warnings.push({
        level: "warn",
        module: "knowledge-graph",
        message: `Dropped relation ${key}: unknown entity ${missing.join(", ")}`,
      });
      return false;
    }
    this.relationByKey.set(key, relation);
    return true;
  }

  /**
   * Merge another graph into this one. Entities first, so relations between
   * newly merged entities resolve.
   */
  merge(other: KnowledgeGraph, warnings: Warning[] = []): void {
    for (const e of other.entities) this.addEntity(e);
    for (const r of other.relations) this.addRelation(r, warnings);
  }

  computeStats(): GraphStats {
    const entityTypes: GraphStats["entityTypes"] = {};
    const relationTypes: GraphStats["relationTypes"] = {};
    let deterministic = 0;
    for (const e of this.entityById.values()) {
      entityTypes[e.entityType] = (entityTypes[e.entityType] ?? 0) + 1;
      if (e.extractionMethod === "deterministic") deterministic++;
    }
    for (const r of this.relationByKey.values()) {
      relationTypes[r.relationType] = (relationTypes[r.relationType] ?? 0) + 1;
    }
    return {
      totalEntities: this.entityById.size,
      totalRelations: this.relationByKey.size,
      entityTypes,
      relationTypes,
      deterministicEntities: deterministic,
      generativeEntities: this.entityById.size - deterministic,
    };
  }

  /**
   * Architecture-style Mermaid diagram: one subgraph per entity type, labelled
   * edges between rendered nodes only.
   * `maxEntities > 0` keeps the N highest-confidence entities.
   */
  toMermaid(options: { maxEntities?: number } = {}): string {
    const maxEntities = options.maxEntities ?? 0;
    let entities = this.entities;
    if (maxEntities > 0 && entities.length > maxEntities) {
      entities = [...entities]
        .sort((a, b) => b.confidence - a.confidence)
        .slice(0, maxEntities);
    }

    const groups = new Map<EntityType, Entity[]>();
    for (const e of entities) {
      const group = groups.get(e.entityType) ?? [];
      group.push(e);
      groups.set(e.entityType, group);
    }

    const lines = ["graph LR"];
    const ids = new NodeIdAllocator();
    const rendered = new Set<string>();
    for (const type of GROUP_ORDER) {
      const members = groups.get(type);
      if (!members || members.length === 0) continue;
      const title = typeTitle(type);
      lines.push(`    subgraph ${ids.idFor(`group:${type}`, title)}[${quoteLabel(title)}]`);
      for (const e of members.slice(0, MAX_NODES_PER_GROUP)) {
        lines.push(`        ${ids.idFor(e.id)}[${quoteLabel(e.name)}]`);
        rendered.add(e.id);
      }
      lines.push("    end");
    }

    const seen = new Set<string>();
    for (const r of this.relationByKey.values()) {
      if (!rendered.has(r.sourceId) || !rendered.has(r.targetId)) continue;
      const src = ids.idFor(r.sourceId);
      const tgt = ids.idFor(r.targetId);
      const edge = `${src}->${tgt}`;
      if (seen.has(edge)) continue;
      seen.add(edge);
      lines.push(`    ${src} -->|${r.relationType.replace(/_/g, " ")}| ${tgt}`);
    }

    return lines.join("\n");
  }

  toJSON(): SerializedGraph {
    return { entities: this.entities, relations: this.relations };
  }

  /**
   * Build a graph from parsed JSON. Malformed entities and relations are
   * skipped with a warning.
   */
  static fromJSON(data: unknown, warnings: Warning[] = []): KnowledgeGraph {
    const graph = new KnowledgeGraph();
    const parsed = z
      .object({
        entities: z.array(z.unknown()).default([]),
        relations: z.array(z.unknown()).default([]),
      })
      .safeParse(data);
    if (!parsed.success) {
      warnings.push({
        level: "error",
        module: "knowledge-graph",
        message: "Graph JSON must be an object with entities and relations arrays",
      });
      return graph;
    }

    for (const [i, raw] of parsed.data.entities.entries()) {
      const entity = EntitySchema.safeParse(raw);
      if (entity.success) graph.addEntity(entity.data);
      else warnings.push(invalidItem("entity", i, entity.error));
    }
    for (const [i, raw] of parsed.data.relations.entries()) {
      const relation = RelationSchema.safeParse(raw);
      if (relation.success) graph.addRelation(relation.data, warnings);
      else warnings.push(invalidItem("relation", i, relation.error));
    }
    return graph;
  }
}

function typeTitle(type: EntityType): string {
  return type
    .split("_")
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(" ");
}

function invalidItem(kind: string, index: number, error: z.ZodError): Warning {
  const detail = error.issues
    .map((issue) => `${issue.path.join(".") || kind}: ${issue.message}`)
    .join("; ");
  return {
    level: "warn",
    module: "knowledge-graph",
    message: `Skipped ${kind} #${index}: ${detail}`,
  };
}
