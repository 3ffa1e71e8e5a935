// src/types.ts — ALL shared types for the documentation coordination core
// Knowledge graph, evidence, plans, agent results, diff pipeline, config, errors.

// ─── Config ──────────────────────────────────────────────────────────────────

export type PrivacyMode = "strict" | "standard" | "permissive";

export interface ResolvedConfig {
  privacyMode: PrivacyMode;
  maxRetries: number;
  minCoveragePct: number;
  maxAssumptions: number;
  useGenerative: boolean;
  llm: {
    provider: "anthropic";
    model: string;
    apiKey?: string;
    baseUrl?: string;
    maxOutputTokens: number;
  };
  output: {
    dir: string;
  };
  verbose: boolean;
}

// Serialized config never carries the API key
export type PublicConfig = Omit<ResolvedConfig, "llm"> & {
  llm: Omit<ResolvedConfig["llm"], "apiKey">;
};

// ─── Warnings (passed to all modules) ───────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Knowledge graph ─────────────────────────────────────────────────────────

export const ENTITY_TYPES = [
  "project",
  "component",
  "technology",
  "protocol",
  "language",
  "framework",
  "database",
  "cloud_service",
  "api_endpoint",
  "metric",
  "configuration",
  "prerequisite",
  "hardware",
  "person_org",
  "license",
  "feature",
  "platform",
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export const RELATION_TYPES = [
  "uses",
  "connects_to",
  "exposes",
  "requires",
  "stores_in",
  "communicates_via",
  "depends_on",
  "runs_on",
  "licensed_under",
  "provides",
  "measures",
  "configured_by",
  "integrates_with",
  "part_of",
] as const;

export type RelationType = (typeof RELATION_TYPES)[number];

export type ExtractionMethod = "deterministic" | "generative";

export interface Entity {
  id: string;
  name: string;
  entityType: EntityType;
  properties: Record<string, unknown>;
  sourceSection: string;
  sourceText: string;
  confidence: number;
  extractionMethod: ExtractionMethod;
}

export interface Relation {
  sourceId: string;
  targetId: string;
  relationType: RelationType;
  properties: Record<string, unknown>;
  confidence: number;
  extractionMethod: ExtractionMethod;
}

export interface GraphStats {
  totalEntities: number;
  totalRelations: number;
  entityTypes: Partial<Record<EntityType, number>>;
  relationTypes: Partial<Record<RelationType, number>>;
  deterministicEntities: number;
  generativeEntities: number;
}

// ─── Repository profile ──────────────────────────────────────────────────────

export interface RepoSignal {
  readonly signalType: string;
  readonly filePath?: string;
  readonly confidence: number;
  readonly details: Readonly<Record<string, unknown>>;
}

export interface RepoProfile {
  readonly repoName: string;
  readonly repoUrl: string;
  readonly description: string;
  readonly primaryLanguage: string;
  readonly languages: readonly string[];
  readonly fileTree: readonly string[];
  readonly signals: readonly RepoSignal[];
  readonly readmeSummary: string;
  readonly license: string;
  readonly topics: readonly string[];
}

// ─── Evidence ────────────────────────────────────────────────────────────────

export const EVIDENCE_TYPES = [
  "readme_section",
  "code_file",
  "code_snippet",
  "config_file",
  "commit",
  "issue",
  "pr",
  "api_schema",
  "diagram_source",
  "external_doc",
] as const;

export type EvidenceType = (typeof EVIDENCE_TYPES)[number];

export interface EvidencePointer {
  readonly id: string;
  readonly evidenceType: EvidenceType;
  readonly sourcePath: string;
  readonly section: string;
  readonly snippet: string;
  readonly lineStart?: number;
  readonly lineEnd?: number;
  readonly commitSha: string;
  readonly url: string;
  readonly confidence: number;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface Claim {
  readonly id: string;
  readonly text: string;
  readonly artifactId: string;
  readonly evidenceIds: readonly string[];
  readonly isAssumption: boolean;
  readonly confidence: number;
}

export interface EvidenceCoverage {
  readonly artifactId: string;
  readonly artifactType: string;
  readonly totalClaims: number;
  readonly backedClaims: number;
  readonly assumptionCount: number;
  readonly assumptions: readonly string[];
  readonly evidenceIds: readonly string[];
  readonly confidenceMean: number;
  readonly confidenceMin: number;
  readonly coveragePct: number;
  readonly isTrustworthy: boolean;
}

// ─── Agents & plans ──────────────────────────────────────────────────────────

export type SpecializedRole =
  | "service-topology"
  | "event-flow"
  | "ml-pipeline"
  | "data-pipeline"
  | "infrastructure";

export type DiffRole = "diff" | "impact" | "regeneration" | "release-notes";

export type AgentRole = "planner" | "executor" | "critic" | SpecializedRole | DiffRole;

export const AGENT_ROLES: readonly AgentRole[] = [
  "planner",
  "executor",
  "critic",
  "service-topology",
  "event-flow",
  "ml-pipeline",
  "data-pipeline",
  "infrastructure",
  "diff",
  "impact",
  "regeneration",
  "release-notes",
];

export const SPECIALIZED_ROLES: readonly SpecializedRole[] = [
  "data-pipeline",
  "event-flow",
  "infrastructure",
  "ml-pipeline",
  "service-topology",
];

export type ToolCallStatus = "pending" | "success" | "failed" | "skipped";

export interface ToolCall {
  id: string;
  toolName: string;
  parameters: Record<string, unknown>;
  expectedOutputType: string;
  status: ToolCallStatus;
  result?: unknown;
  error?: string;
  evidenceIds: string[];
}

export interface PlanStep {
  stepNumber: number;
  description: string;
  role: AgentRole;
  toolCalls: ToolCall[];
  dependsOn: number[];
  expectedOutput: string;
  completed: boolean;
}

export interface AgentPlan {
  planId: string;
  createdAt: string;
  goal: string;
  steps: PlanStep[];
  metadata: Record<string, unknown>;
}

export interface AgentResult {
  role: AgentRole;
  success: boolean;
  artifacts: Record<string, unknown>;
  evidenceIds: string[];
  errors: string[];
  warnings: string[];
  durationMs: number;
  metadata: Record<string, unknown>;
}

export interface CriticVerdict {
  approved: boolean;
  coverageScores: Record<string, EvidenceCoverage>;
  flaggedClaims: Claim[];
  replanReason: string;
  globalCoveragePct: number;
  review: string;
}

export type OrchestratorState =
  | "planning"
  | "executing"
  | "validating"
  | "approved"
  | "replanning"
  | "exhausted";

export interface OrchestrationResult {
  approved: boolean;
  iterations: number;
  plan?: AgentPlan;
  stepResults: AgentResult[];
  criticResult?: AgentResult;
  verdict?: CriticVerdict;
  artifacts: Record<string, unknown>;
  coverage: EvidenceCoverage[];
  reasons: string[];
  states: OrchestratorState[];
  durationMs: number;
  warnings: Warning[];
}

// ─── Diff pipeline ───────────────────────────────────────────────────────────

export type FileStatus = "added" | "modified" | "deleted" | "renamed";

export interface FileDiff {
  path: string;
  status: FileStatus;
  additions: number;
  deletions: number;
  oldPath?: string;
}

export interface DiffSummary {
  baseRef: string;
  headRef: string;
  totalFiles: number;
  totalAdditions: number;
  totalDeletions: number;
  fileDiffs: FileDiff[];
}

export type DeltaKind = "add" | "update" | "remove";

export interface EntityDelta {
  entityId: string;
  kind: DeltaKind;
  entityName: string;
  reason: string;
  affectedFiles: string[];
}

export interface RelationDelta {
  sourceId: string;
  targetId: string;
  kind: DeltaKind;
  relationType: string;
  reason: string;
}

export type DocFormat = "BLOG" | "LATEX" | "PDF" | "PPTX" | "WORD";

export const DOC_FORMATS: readonly DocFormat[] = ["BLOG", "LATEX", "PDF", "PPTX", "WORD"];

export interface ImpactReport {
  entityDeltas: EntityDelta[];
  relationDeltas: RelationDelta[];
  impactedFormats: DocFormat[];
  confidence: number;
  totalDeltas: number;
}

export interface RegenerationResult {
  success: boolean;
  regenerated: DocFormat[];
  impactedEntities: string[];
  skippedReason?: string;
}

export type ReleaseNoteCategory = "added" | "changed" | "fixed" | "removed" | "security";

export interface ReleaseNote {
  category: ReleaseNoteCategory;
  title: string;
  description: string;
  files: string[];
  breaking: boolean;
}

export interface ReleaseNotes {
  version: string;
  date: string;
  summary: string;
  notes: ReleaseNote[];
}

// ─── Error types ─────────────────────────────────────────────────────────────

export class LLMError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = "LLMError";
  }
}

export class PlannerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlannerError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const ENGINE_VERSION = "0.1.0";

export const DEFAULT_MAX_RETRIES = 2;
export const DEFAULT_MIN_COVERAGE_PCT = 80;
export const DEFAULT_MAX_ASSUMPTIONS = 5;

export const MAX_SNIPPET_CHARS = 200;
export const TRUSTWORTHY_COVERAGE_PCT = 80;
export const TRUSTWORTHY_MIN_CONFIDENCE = 0.3;

export const DEFAULT_EXCLUDE_DIRS = [
  "node_modules",
  ".git",
  "dist",
  "build",
  "coverage",
  ".venv",
  "__pycache__",
] as const;
