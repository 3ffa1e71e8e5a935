// src/diff/pipeline.ts — Diff → Impact → Regeneration → Release notes

import type {
  AgentResult,
  DiffSummary,
  ImpactReport,
  RegenerationResult,
  ReleaseNotes,
  Warning,
} from "../types.js";
import type { KnowledgeGraph } from "../knowledge-graph.js";
import type { DiffProvider } from "./diff-collector.js";
import { changedPaths, collectDiff } from "./diff-collector.js";
import { analyzeImpact } from "./impact-analyzer.js";
import type { FormatRenderers } from "./regeneration.js";
import { planRegeneration } from "./regeneration.js";
import { buildReleaseNotes, renderReleaseNotes } from "./release-notes.js";
import { elapsedMs, makeResult } from "../agent-result.js";
import { vlog } from "../log.js";

export interface DiffPipelineOptions {
  provider: DiffProvider;
  repo: string;
  baseRef: string;
  headRef: string;
  graph: KnowledgeGraph;
  version?: string;
  date?: string;
  renderers?: FormatRenderers;
  verbose?: boolean;
}

export interface DiffPipelineResult {
  success: boolean;
  diff?: DiffSummary;
  impact?: ImpactReport;
  regeneration?: RegenerationResult;
  releaseNotes?: ReleaseNotes;
  markdown: string;
  stages: AgentResult[];
  warnings: Warning[];
}

/**
 * Never throws for a provider failure: the diff stage reports it and the
 * remaining stages do not run.
 */
export async function runDiffPipeline(options: DiffPipelineOptions): Promise<DiffPipelineResult> {
  const verbose = options.verbose ?? false;
  const warnings: Warning[] = [];
  const stages: AgentResult[] = [];

  let start = performance.now();
  let diff: DiffSummary;
  try {
    diff = await collectDiff(options.provider, options.repo, options.baseRef, options.headRef);
  } catch (err) {
    const message = `Diff ${options.baseRef}..${options.headRef} failed: ${err instanceof Error ? err.message : String(err)}`;
    warnings.push({ level: "error", module: "diff", message });
    stages.push(makeResult("diff", { success: false, errors: [message], durationMs: elapsedMs(start) }));
    return { success: false, markdown: "", stages, warnings };
  }
  stages.push(
    makeResult("diff", {
      artifacts: { diffSummary: diff, changedPaths: changedPaths(diff) },
      durationMs: elapsedMs(start),
    }),
  );
  vlog(verbose, `Diff: ${diff.totalFiles} files (+${diff.totalAdditions}/-${diff.totalDeletions})`);

  start = performance.now();
  const impact = analyzeImpact(diff, options.graph);
  stages.push(makeResult("impact", { artifacts: { impactReport: impact }, durationMs: elapsedMs(start) }));
  vlog(verbose, `Impact: ${impact.totalDeltas} deltas`);

  start = performance.now();
  const regeneration = await planRegeneration(impact, options.renderers, warnings);
  stages.push(
    makeResult("regeneration", {
      success: regeneration.success,
      artifacts: { regeneration },
      warnings: regeneration.skippedReason ? [regeneration.skippedReason] : [],
      durationMs: elapsedMs(start),
    }),
  );

  start = performance.now();
  const releaseNotes = buildReleaseNotes(diff, impact, { version: options.version, date: options.date });
  const markdown = renderReleaseNotes(releaseNotes);
  stages.push(
    makeResult("release-notes", {
      artifacts: { releaseNotes, releaseNotesMarkdown: markdown },
      durationMs: elapsedMs(start),
    }),
  );

  return {
    success: stages.every((s) => s.success),
    diff,
    impact,
    regeneration,
    releaseNotes,
    markdown,
    stages,
    warnings,
  };
}
