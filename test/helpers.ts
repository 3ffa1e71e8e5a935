import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { Entity, EntityType, Relation, RelationType, RepoProfile, RepoSignal } from "../src/types.js";
import { KnowledgeGraph } from "../src/knowledge-graph.js";
import type { GenerativeClient } from "../src/llm/client.js";

export function entity(id: string, entityType: EntityType = "component", properties: Record<string, unknown> = {}): Entity {
  return {
    id,
    name: id,
    entityType,
    properties,
    sourceSection: "",
    sourceText: "",
    confidence: 1,
    extractionMethod: "deterministic",
  };
}

export function relation(sourceId: string, targetId: string, relationType: RelationType = "uses"): Relation {
  return { sourceId, targetId, relationType, properties: {}, confidence: 1, extractionMethod: "deterministic" };
}

export function graphOf(entities: Entity[], relations: Relation[] = []): KnowledgeGraph {
  const graph = new KnowledgeGraph();
  for (const e of entities) graph.addEntity(e);
  for (const r of relations) graph.addRelation(r);
  return graph;
}

export function signal(signalType: string, filePath?: string): RepoSignal {
  return filePath === undefined
    ? { signalType, confidence: 0.6, details: { source: "readme_mention" } }
    : { signalType, filePath, confidence: 0.9, details: {} };
}

export function makeProfile(overrides: Partial<RepoProfile> = {}): RepoProfile {
  return {
    repoName: "shop",
    repoUrl: "",
    description: "A sample shop",
    primaryLanguage: "TypeScript",
    languages: ["TypeScript"],
    fileTree: [],
    signals: [],
    readmeSummary: "",
    license: "MIT",
    topics: [],
    ...overrides,
  };
}

/**
 * A collaborator whose every call rejects, as when no API key is configured.
 */
export function failingClient(message = "offline"): GenerativeClient {
  return {
    chatText: () => Promise.reject(new Error(message)),
    chatJson: () => Promise.reject(new Error(message)),
  };
}

/**
 * Write files under a fresh temporary directory and return its path.
 */
export function tempRepo(files: Record<string, string>): string {
  const root = mkdtempSync(join(tmpdir(), "docloop-repo-"));
  for (const [path, content] of Object.entries(files)) {
    mkdirSync(dirname(join(root, path)), { recursive: true });
    writeFileSync(join(root, path), content);
  }
  return root;
}
