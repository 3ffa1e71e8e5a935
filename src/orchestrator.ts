// src/orchestrator.ts — Planner → Executor/agents → Critic loop with bounded replanning
// Owns the PrivacyGuard; each run gets a fresh EvidenceRegistry.

import type {
  AgentPlan,
  AgentResult,
  CriticVerdict,
  OrchestrationResult,
  OrchestratorState,
  PlanStep,
  PrivacyMode,
  RepoProfile,
  SpecializedRole,
  Warning,
} from "./types.js";
import { DEFAULT_MAX_RETRIES } from "./types.js";
import type { KnowledgeGraph } from "./knowledge-graph.js";
import { EvidenceRegistry } from "./evidence-registry.js";
import { PrivacyGuard } from "./privacy-guard.js";
import type { GenerativeClient } from "./llm/client.js";
import type { ToolAdapterRegistry } from "./tool-contracts.js";
import { Planner, executionOrder } from "./planner.js";
import { Executor } from "./executor.js";
import { Critic } from "./critic.js";
import type { AgentDeps, SpecializedAgent } from "./agents/base.js";
import { createSpecializedAgents, isSpecializedRole } from "./agents/index.js";
import { elapsedMs, makeResult } from "./agent-result.js";
import { errorMessage, vlog } from "./log.js";

export interface OrchestratorOptions {
  privacyMode?: PrivacyMode;
  maxRetries?: number;
  minCoveragePct?: number;
  maxAssumptions?: number;
  /** Effective only when a client is supplied. */
  useGenerative?: boolean;
  client?: GenerativeClient | null;
  adapters?: ToolAdapterRegistry;
  /** Replaces the default planner. */
  planner?: Planner;
  /** Replaces the built-in specialized agents. */
  createAgents?: (deps: AgentDeps) => ReadonlyMap<SpecializedRole, SpecializedAgent>;
  warnings?: Warning[];
  verbose?: boolean;
}

export interface OrchestrationInput {
  profile: RepoProfile;
  graph: KnowledgeGraph;
}

/**
 * Components that live for one run: the registry is created when the run
 * starts and dropped when it ends.
 */
interface RunScope {
  registry: EvidenceRegistry;
  planner: Planner;
  executor: Executor;
  critic: Critic;
  agents: ReadonlyMap<SpecializedRole, SpecializedAgent>;
  warnings: Warning[];
}

export class Orchestrator {
  readonly guard: PrivacyGuard;
  readonly maxRetries: number;

  private readonly client: GenerativeClient | null;
  private readonly useGenerative: boolean;
  private readonly verbose: boolean;

  constructor(private readonly options: OrchestratorOptions = {}) {
    this.client = options.client ?? null;
    this.guard = new PrivacyGuard(options.privacyMode ?? "standard");
    this.maxRetries = Math.max(0, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.useGenerative = (options.useGenerative ?? true) && this.client !== null;
    this.verbose = options.verbose ?? false;
  }

  private createScope(): RunScope {
    const { options, client, guard, verbose } = this;
    const registry = new EvidenceRegistry();
    // Caller-supplied warnings collect across runs; otherwise each run starts empty
    const warnings = options.warnings ?? [];
    const shared = { guard, warnings, verbose };
    return {
      registry,
      warnings,
      planner: options.planner ?? new Planner({ ...shared, client }),
      executor: new Executor({ ...shared, adapters: options.adapters ?? new Map(), registry }),
      critic: new Critic({
        ...shared,
        client,
        registry,
        minCoveragePct: options.minCoveragePct,
        maxAssumptions: options.maxAssumptions,
      }),
      agents: (options.createAgents ?? createSpecializedAgents)({ client, registry, guard, warnings }),
    };
  }

  /**
   * Run the loop. Never throws for domain failures: a planner failure ends
   * the run with an unapproved result carrying the reason.
   */
  async run({ profile, graph }: OrchestrationInput): Promise<OrchestrationResult> {
    const start = performance.now();
    const scope = this.createScope();
    const states: OrchestratorState[] = [];
    const stepResults: AgentResult[] = [];
    let plan: AgentPlan | undefined;
    let verdict: CriticVerdict | undefined;
    let criticResult: AgentResult | undefined;
    let reasons: string[] = [];
    let iterations = 0;

    const safeProfile = this.guard.sanitizeProfile(profile);

    while (iterations < this.maxRetries + 1) {
      iterations++;
      vlog(this.verbose, `Iteration ${iterations}`);

      // ─── Plan ───
      states.push("planning");
      let current: AgentPlan;
      try {
        current = (await scope.planner.plan({
          profile: safeProfile,
          graph,
          priorResults: iterations > 1 ? [...stepResults] : [],
          iteration: iterations,
          useGenerative: this.useGenerative,
          replanOf: plan?.planId,
        })).plan;
      } catch (err) {
        const message = errorMessage(err);
        scope.warnings.push({ level: "error", module: "orchestrator", message });
        reasons = [message];
        break;
      }
      plan = current;

      // ─── Execute ───
      states.push("executing");
      for (const step of executionOrder(current, scope.warnings)) {
        vlog(this.verbose, `  Step ${step.stepNumber} [${step.role}]: ${step.description}`);
        const result = await this.runStep(scope, step, safeProfile, graph, stepResults);
        step.completed = result.success;
        stepResults.push(result);
      }

      // ─── Validate ───
      states.push("validating");
      const review = await scope.critic.run({
        profile: safeProfile,
        graph,
        priorResults: stepResults,
        useGenerative: this.useGenerative,
      });
      verdict = review.verdict;
      criticResult = review.result;
      for (const step of current.steps) {
        if (step.role === "critic") step.completed = review.verdict.approved;
      }

      if (review.verdict.approved) {
        reasons = [];
        states.push("approved");
        break;
      }
      reasons = review.result.errors;
      states.push(iterations <= this.maxRetries ? "replanning" : "exhausted");
    }

    const artifacts: Record<string, unknown> = {};
    for (const r of stepResults) Object.assign(artifacts, r.artifacts);

    return {
      approved: verdict?.approved ?? false,
      iterations,
      plan,
      stepResults,
      criticResult,
      verdict,
      artifacts,
      coverage: scope.registry.computeAllCoverage(),
      reasons,
      states,
      durationMs: elapsedMs(start),
      warnings: scope.warnings,
    };
  }

  private async runStep(
    scope: RunScope,
    step: PlanStep,
    profile: RepoProfile,
    graph: KnowledgeGraph,
    priorResults: AgentResult[],
  ): Promise<AgentResult> {
    const agent = isSpecializedRole(step.role, scope.agents) ? scope.agents.get(step.role) : undefined;
    if (!agent) return scope.executor.executeStep(step, [...priorResults]);

    try {
      return await agent.run({ profile, graph, useGenerative: this.useGenerative, priorResults: [...priorResults] });
    } catch (err) {
      return makeResult(agent.role, {
        success: false,
        errors: [`Agent ${agent.role} failed: ${errorMessage(err)}`],
        metadata: { stepNumber: step.stepNumber },
      });
    }
  }

}

/**
 * One-shot convenience over a fresh Orchestrator.
 */
export async function orchestrate(
  input: OrchestrationInput,
  options: OrchestratorOptions = {},
): Promise<OrchestrationResult> {
  return new Orchestrator(options).run(input);
}

/**
 * Plain-text report of a run, one fact per line.
 */
export function summarizeOrchestration(result: OrchestrationResult): string {
  const total = result.plan?.steps.length ?? 0;
  const completed = result.plan?.steps.filter((s) => s.completed).length ?? 0;
  const lines = [
    `Status: ${result.approved ? "APPROVED" : "REJECTED"}`,
    `Iterations: ${result.iterations}`,
    `States: ${result.states.join(" → ")}`,
    `Steps completed: ${completed}/${total}`,
  ];
  if (result.verdict) {
    lines.push(
      `Evidence coverage: ${result.verdict.globalCoveragePct.toFixed(1)}%`,
      `Assumptions: ${result.verdict.flaggedClaims.length}`,
    );
  }
  lines.push(`Artifacts: ${Object.keys(result.artifacts).sort().join(", ") || "none"}`);
  if (result.reasons.length > 0) {
    lines.push("Reasons:", ...result.reasons.map((r) => `- ${r}`));
  }
  lines.push(`Duration: ${result.durationMs.toFixed(1)}ms`);
  return lines.join("\n");
}
