// src/diff/impact-analyzer.ts — Map file changes onto knowledge-graph deltas
// File → entity index from path-bearing properties, one-hop relation
// tracing, coarse output-format attribution.

import type {
  DiffSummary,
  DeltaKind,
  DocFormat,
  Entity,
  EntityDelta,
  FileStatus,
  ImpactReport,
  RelationDelta,
} from "../types.js";
import { DOC_FORMATS } from "../types.js";
import type { KnowledgeGraph } from "../knowledge-graph.js";

const PATH_PROPERTIES = ["source_file", "file_path", "path", "sourceFile", "filePath"] as const;

const CONFIDENCE_WITH_DELTAS = 0.9;
const CONFIDENCE_WITHOUT_DELTAS = 0.5;

export function indexEntitiesByFile(graph: KnowledgeGraph): Map<string, Entity[]> {
  const index = new Map<string, Entity[]>();
  for (const entity of graph.entities) {
    const paths = new Set<string>();
    for (const key of PATH_PROPERTIES) {
      const value = entity.properties[key];
      if (typeof value === "string" && value) paths.add(value);
    }
    for (const path of paths) {
      const list = index.get(path) ?? [];
      list.push(entity);
      index.set(path, list);
    }
  }
  return index;
}

function deltaKind(status: FileStatus): DeltaKind {
  if (status === "deleted") return "remove";
  if (status === "added") return "add";
  return "update";
}

/**
 * Any entity delta marks every output format as impacted; section-level
 * attribution is not attempted.
 */
export function analyzeImpact(diff: DiffSummary, graph: KnowledgeGraph): ImpactReport {
  const index = indexEntitiesByFile(graph);
  const entityDeltas: EntityDelta[] = [];

  for (const fd of diff.fileDiffs) {
    // A renamed file is still referenced by its old path in the graph
    const matches = index.get(fd.path) ?? (fd.oldPath ? index.get(fd.oldPath) : undefined) ?? [];
    for (const entity of matches) {
      entityDeltas.push({
        entityId: entity.id,
        kind: deltaKind(fd.status),
        entityName: entity.name,
        reason: `File ${fd.path} was ${fd.status}`,
        affectedFiles: [fd.path],
      });
    }
    if (matches.length === 0 && fd.status === "added") {
      entityDeltas.push({
        entityId: `new:${fd.path}`,
        kind: "add",
        entityName: fd.path,
        reason: `New file ${fd.path} has no knowledge-graph entity yet`,
        affectedFiles: [fd.path],
      });
    }
  }

  const affected = new Set(entityDeltas.map((d) => d.entityId));
  const relationDeltas: RelationDelta[] = graph.relations
    .filter((r) => affected.has(r.sourceId) || affected.has(r.targetId))
    .map((r): RelationDelta => ({
      sourceId: r.sourceId,
      targetId: r.targetId,
      kind: "update",
      relationType: r.relationType,
      reason: "Connected entity was modified",
    }));

  const impactedFormats: DocFormat[] = entityDeltas.length > 0 ? [...DOC_FORMATS] : [];

  return {
    entityDeltas,
    relationDeltas,
    impactedFormats,
    confidence: entityDeltas.length > 0 ? CONFIDENCE_WITH_DELTAS : CONFIDENCE_WITHOUT_DELTAS,
    totalDeltas: entityDeltas.length + relationDeltas.length,
  };
}
