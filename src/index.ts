// src/index.ts — Public API

// ─── Orchestration ───
export { Orchestrator, orchestrate, summarizeOrchestration } from "./orchestrator.js";
export type { OrchestratorOptions, OrchestrationInput } from "./orchestrator.js";
export { Planner, HeuristicPlanBuilder, GenerativePlanBuilder, detectActivatedRoles, executionOrder, planProgress } from "./planner.js";
export type { PlanBuilder, PlanContext, PlanRequest } from "./planner.js";
export { Executor, stepArtifactId } from "./executor.js";
export { Critic, REVIEW_UNAVAILABLE } from "./critic.js";
export { createSpecializedAgents } from "./agents/index.js";
export type { AgentContext, AgentDeps, DomainComponent, SpecializedAgent } from "./agents/index.js";

// ─── Shared state ───
export { KnowledgeGraph, relationKey } from "./knowledge-graph.js";
export type { SerializedGraph } from "./knowledge-graph.js";
export { EvidenceRegistry, createClaim, createEvidencePointer, coverageSummary } from "./evidence-registry.js";
export { PrivacyGuard } from "./privacy-guard.js";
export { buildRepoProfile, detectSignals } from "./repo-profile.js";

// ─── Tools ───
export { TOOL_CONTRACTS, getContract, validateParams } from "./tool-contracts.js";
export type { ToolAdapter, ToolAdapterRegistry, ToolContract } from "./tool-contracts.js";
export { createLocalAdapters } from "./tools/index.js";

// ─── Generative collaborator ───
export { createGenerativeClient, parseJsonResponse } from "./llm/client.js";
export type { GenerativeClient } from "./llm/client.js";
export { withFallback } from "./llm/fallback.js";

// ─── Diff pipeline ───
export { runDiffPipeline } from "./diff/pipeline.js";
export type { DiffPipelineOptions, DiffPipelineResult } from "./diff/pipeline.js";
export { GitDiffProvider, collectDiff } from "./diff/diff-collector.js";
export type { DiffProvider } from "./diff/diff-collector.js";
export { analyzeImpact } from "./diff/impact-analyzer.js";
export { planRegeneration } from "./diff/regeneration.js";
export { buildReleaseNotes, renderReleaseNotes } from "./diff/release-notes.js";

// ─── Config ───
export { resolveConfig, publicConfig } from "./config.js";

export * from "./types.js";
