// src/critic.ts — Critic: evidence coverage verdict over a run's claims
// Coverage thresholds decide approval; the generative review is commentary only.

import { z } from "zod";
import type {
  AgentResult,
  Claim,
  CriticVerdict,
  EvidenceCoverage,
  RepoProfile,
  Warning,
} from "./types.js";
import { DEFAULT_MAX_ASSUMPTIONS, DEFAULT_MIN_COVERAGE_PCT, LLMError } from "./types.js";
import type { EvidenceRegistry } from "./evidence-registry.js";
import type { PrivacyGuard } from "./privacy-guard.js";
import type { GenerativeClient } from "./llm/client.js";
import type { KnowledgeGraph } from "./knowledge-graph.js";
import { elapsedMs, makeResult } from "./agent-result.js";
import { withFallback } from "./llm/fallback.js";
import { vlog } from "./log.js";

export const REVIEW_UNAVAILABLE = "(generative review unavailable)";

const MAX_REVIEW_ARTIFACTS = 15;
const MAX_REVIEW_EVIDENCE = 10;

const ReviewSchema = z.object({
  quality_score: z.number().optional(),
  summary: z.string().default(""),
  weaknesses: z.array(z.string()).default([]),
  hallucination_risks: z.array(z.string()).default([]),
});

export interface CriticOptions {
  registry: EvidenceRegistry;
  guard: PrivacyGuard;
  client: GenerativeClient | null;
  minCoveragePct?: number;
  maxAssumptions?: number;
  warnings?: Warning[];
  verbose?: boolean;
}

export interface ReviewRequest {
  profile: RepoProfile;
  graph: KnowledgeGraph;
  priorResults: AgentResult[];
  useGenerative: boolean;
}

export class Critic {
  readonly minCoveragePct: number;
  readonly maxAssumptions: number;

  constructor(private readonly options: CriticOptions) {
    this.minCoveragePct = options.minCoveragePct ?? DEFAULT_MIN_COVERAGE_PCT;
    this.maxAssumptions = options.maxAssumptions ?? DEFAULT_MAX_ASSUMPTIONS;
  }

  /**
   * Verdict from the registry alone. Both threshold failures are reported
   * when both apply.
   */
  evaluate(): { verdict: Omit<CriticVerdict, "review">; reasons: string[] } {
    const { registry } = this.options;
    const scores = registry.computeAllCoverage();
    const flagged: Claim[] = registry.allClaims().filter((c) => c.isAssumption);

    const totalClaims = scores.reduce((n, s) => n + s.totalClaims, 0);
    const totalBacked = scores.reduce((n, s) => n + s.backedClaims, 0);
    const globalCoveragePct = totalClaims > 0 ? (totalBacked / totalClaims) * 100 : 100;

    const reasons: string[] = [];
    if (globalCoveragePct < this.minCoveragePct) {
      reasons.push(
        `Evidence coverage ${globalCoveragePct.toFixed(1)}% is below threshold ${this.minCoveragePct}%. ${flagged.length} unsupported claim(s) found.`,
      );
    }
    if (flagged.length > this.maxAssumptions) {
      reasons.push(
        `Too many assumptions (${flagged.length}) exceed limit (${this.maxAssumptions}). Re-planning required.`,
      );
    }

    const coverageScores: Record<string, EvidenceCoverage> = {};
    for (const s of scores) coverageScores[s.artifactId] = s;

    return {
      verdict: {
        approved: reasons.length === 0,
        coverageScores,
        flaggedClaims: flagged,
        replanReason: reasons.join(" "),
        globalCoveragePct,
      },
      reasons,
    };
  }

  async run(request: ReviewRequest): Promise<{ verdict: CriticVerdict; result: AgentResult }> {
    const start = performance.now();
    const { verdict: base, reasons } = this.evaluate();

    let review = "";
    const client = this.options.client;
    if (request.useGenerative && client && request.priorResults.length > 0) {
      const outcome = await withFallback(
        () => this.review(client, request, base.globalCoveragePct),
        () => REVIEW_UNAVAILABLE,
        (message) => {
          this.options.warnings?.push({
            level: "warn",
            module: "critic",
            message: `Generative review failed: ${message}`,
          });
        },
      );
      review = outcome.value;
    }

    const verdict: CriticVerdict = { ...base, review };
    vlog(
      this.options.verbose ?? false,
      `Critic: coverage ${verdict.globalCoveragePct.toFixed(1)}%, ${verdict.flaggedClaims.length} assumption(s), ${verdict.approved ? "approved" : "rejected"}`,
    );

    return {
      verdict,
      result: makeResult("critic", {
        success: verdict.approved,
        artifacts: { verdict },
        errors: reasons,
        durationMs: elapsedMs(start),
        metadata: {
          totalClaims: Object.values(verdict.coverageScores).reduce((n, s) => n + s.totalClaims, 0),
          flaggedCount: verdict.flaggedClaims.length,
          generativeReviewed: review !== "" && review !== REVIEW_UNAVAILABLE,
        },
      }),
    };
  }

  private async review(
    client: GenerativeClient,
    { profile, graph, priorResults }: ReviewRequest,
    globalCoveragePct: number,
  ): Promise<string> {
    const { guard, registry } = this.options;
    const artifacts: Record<string, unknown> = {};
    for (const r of priorResults) Object.assign(artifacts, r.artifacts);
    const summaries: string[] = [];
    for (const [key, value] of Object.entries(guard.sanitizeContext(artifacts))) {
      if (typeof value === "string" && value.length > 20) summaries.push(`- ${key}: ${value.slice(0, 300)}`);
      else if (typeof value === "object" && value !== null) summaries.push(`- ${key}: ${JSON.stringify(value).slice(0, 200)}`);
    }
    const evidence = registry
      .allPointers()
      .slice(0, MAX_REVIEW_EVIDENCE)
      .map((p) => guard.sanitizeEvidence(p))
      .map((p) => `- [${p.evidenceType}] ${p.sourcePath || p.commitSha}: ${p.snippet}`);

    const user = [
      `Repository: ${profile.repoName}`,
      `Entities: ${graph.entities.slice(0, 20).map((e) => e.name).join(", ")}`,
      `Evidence coverage: ${globalCoveragePct.toFixed(1)}%`,
      "",
      "Artifacts:",
      summaries.slice(0, MAX_REVIEW_ARTIFACTS).join("\n") || "No artifacts generated",
      "",
      "Evidence:",
      evidence.join("\n") || "None",
    ].join("\n");

    const data = await client.chatJson(
      "You are a documentation quality critic. Review generated artifacts for accuracy, completeness and hallucination risk. " +
        "Return JSON with: quality_score (1-10), summary (string), weaknesses (list of strings), hallucination_risks (list of strings).",
      user,
      { maxTokens: 1000 },
    );
    if (typeof data.parseError === "string") throw new LLMError(`Unparseable review: ${data.parseError}`);
    const parsed = ReviewSchema.safeParse(data);
    if (!parsed.success) throw new LLMError(`Review did not match the expected shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);

    const r = parsed.data;
    const lines = [r.quality_score !== undefined ? `Quality score: ${r.quality_score}/10` : "", r.summary];
    for (const w of r.weaknesses) lines.push(`- Weakness: ${w}`);
    for (const h of r.hallucination_risks) lines.push(`- Hallucination risk: ${h}`);
    return lines.filter((l) => l !== "").join("\n");
  }
}
