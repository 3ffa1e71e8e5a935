// src/planner.ts — Planner: repo signals + knowledge graph → AgentPlan
// Chooses specialized roles from signals, then builds a plan with the
// generative collaborator, falling back to a fixed template.

import { randomUUID } from "node:crypto";
import { z } from "zod";
import type {
  AgentPlan,
  AgentResult,
  AgentRole,
  PlanStep,
  RepoProfile,
  SpecializedRole,
  ToolCall,
  Warning,
} from "./types.js";
import { AGENT_ROLES, LLMError, PlannerError } from "./types.js";
import type { KnowledgeGraph } from "./knowledge-graph.js";
import type { GenerativeClient } from "./llm/client.js";
import type { PrivacyGuard } from "./privacy-guard.js";
import { withFallback } from "./llm/fallback.js";
import type { FallbackOutcome } from "./llm/fallback.js";
import { describeTools } from "./tool-contracts.js";
import { elapsedMs, makeResult } from "./agent-result.js";
import { vlog } from "./log.js";

// ─── Signal routing ──────────────────────────────────────────────────────────

const SIGNAL_TO_ROLE: Record<string, SpecializedRole> = {
  "docker-compose": "service-topology",
  Dockerfile: "service-topology",
  kubernetes: "service-topology",
  k8s: "service-topology",
  helm: "infrastructure",
  terraform: "infrastructure",
  pulumi: "infrastructure",
  cloudformation: "infrastructure",
  kafka: "event-flow",
  rabbitmq: "event-flow",
  sqs: "event-flow",
  eventbridge: "event-flow",
  nats: "event-flow",
  "ml-training": "ml-pipeline",
  pytorch: "ml-pipeline",
  tensorflow: "ml-pipeline",
  huggingface: "ml-pipeline",
  "vector-db": "ml-pipeline",
  rag: "ml-pipeline",
  airflow: "data-pipeline",
  dbt: "data-pipeline",
  spark: "data-pipeline",
  warehouse: "data-pipeline",
};

/**
 * Specialized roles activated by the profile's signals, sorted, without duplicates.
 */
export function detectActivatedRoles(profile: RepoProfile): SpecializedRole[] {
  const roles = new Set<SpecializedRole>();
  for (const signal of profile.signals) {
    const role = SIGNAL_TO_ROLE[signal.signalType];
    if (role) roles.add(role);
  }
  return [...roles].sort();
}

// ─── Plan helpers ────────────────────────────────────────────────────────────

const CRITIC_DESCRIPTION = "Validate all artifacts against evidence pointers";

export function newToolCall(
  toolName: string,
  parameters: Record<string, unknown>,
  expectedOutputType = "json",
): ToolCall {
  return {
    id: `tc-${randomUUID().replace(/-/g, "").slice(0, 8)}`,
    toolName,
    parameters,
    expectedOutputType,
    status: "pending",
    evidenceIds: [],
  };
}

function criticStep(stepNumber: number, dependsOn: number[]): PlanStep {
  return {
    stepNumber,
    description: CRITIC_DESCRIPTION,
    role: "critic",
    toolCalls: [],
    dependsOn,
    expectedOutput: "Evidence coverage report",
    completed: false,
  };
}

export function planProgress(plan: AgentPlan): number {
  if (plan.steps.length === 0) return 0;
  return plan.steps.filter((s) => s.completed).length / plan.steps.length;
}

/**
 * Non-critic steps in dependency order. Ties keep plan order, so a plan
 * whose steps already follow their dependencies runs unchanged. Steps caught
 * in a cycle run last, in plan order.
 */
export function executionOrder(plan: AgentPlan, warnings: Warning[] = []): PlanStep[] {
  const pending = plan.steps.filter((s) => s.role !== "critic");
  const known = new Set(pending.map((s) => s.stepNumber));
  const done = new Set<number>();
  const ordered: PlanStep[] = [];

  while (pending.length > 0) {
    const index = pending.findIndex((s) =>
      s.dependsOn.every((d) => !known.has(d) || done.has(d)),
    );
    if (index === -1) {
      warnings.push({
        level: "error",
        module: "planner",
        message: `Dependency cycle among steps ${pending.map((s) => s.stepNumber).join(", ")}; running them in plan order`,
      });
      ordered.push(...pending);
      break;
    }
    const [step] = pending.splice(index, 1);
    done.add(step.stepNumber);
    ordered.push(step);
  }
  return ordered;
}

// ─── Builders ────────────────────────────────────────────────────────────────

export interface PlanContext {
  /** Already privacy-sanitized. */
  profile: RepoProfile;
  graph: KnowledgeGraph;
  activatedRoles: SpecializedRole[];
  priorResults: AgentResult[];
  iteration: number;
}

export interface PlanBuilder {
  build(context: PlanContext): Promise<AgentPlan>;
}

export class HeuristicPlanBuilder implements PlanBuilder {
  async build({ profile, graph, activatedRoles }: PlanContext): Promise<AgentPlan> {
    const steps: PlanStep[] = [];

    steps.push({
      stepNumber: 1,
      description: "Search repo for architecture-relevant files",
      role: "executor",
      toolCalls: [
        newToolCall("repo.search", {
          query: "docker|kubernetes|terraform|setup|config",
          max_results: 50,
        }),
      ],
      dependsOn: [],
      expectedOutput: "List of architecture-relevant file paths",
      completed: false,
    });

    steps.push({
      stepNumber: 2,
      description: "Render architecture diagram from knowledge graph",
      role: "executor",
      toolCalls: [
        newToolCall(
          "diagram.render",
          { type: "mermaid", spec: graph.toMermaid({ maxEntities: 30 }), output_format: "svg" },
          "svg",
        ),
      ],
      dependsOn: [],
      expectedOutput: "SVG architecture diagram",
      completed: false,
    });

    for (const role of activatedRoles) {
      steps.push({
        stepNumber: steps.length + 1,
        description: `Run ${role} agent for domain-specific analysis`,
        role,
        toolCalls: [],
        dependsOn: [1],
        expectedOutput: `Domain diagram and section from ${role}`,
        completed: false,
      });
    }

    steps.push({
      stepNumber: steps.length + 1,
      description: "Refine Word document with agent-generated content",
      role: "executor",
      toolCalls: [
        newToolCall(
          "docx.refine",
          {
            instructions: "Incorporate architecture diagrams and domain-specific sections",
            references_to_kg: graph.entities.slice(0, 20).map((e) => e.id),
          },
          "docx",
        ),
      ],
      dependsOn: steps.slice(1).map((s) => s.stepNumber),
      expectedOutput: "Enhanced Word document",
      completed: false,
    });

    steps.push(criticStep(steps.length + 1, [steps.length]));

    return {
      planId: randomUUID(),
      createdAt: new Date().toISOString(),
      goal: `Generate enhanced documentation for ${profile.repoName}`,
      steps,
      metadata: {
        repo: profile.repoName,
        entityCount: graph.entities.length,
        activatedRoles,
        strategy: "heuristic",
      },
    };
  }
}

const RawToolCallSchema = z.object({
  tool_name: z.string().min(1),
  parameters: z.record(z.unknown()).default({}),
  expected_output_type: z.string().default("json"),
});

const RawStepSchema = z.object({
  step_number: z.number().int().optional(),
  description: z.string().default(""),
  agent_role: z.string().default("executor"),
  tool_calls: z.array(RawToolCallSchema).default([]),
  depends_on: z.array(z.number().int()).default([]),
  expected_output: z.string().default(""),
});

const RawPlanSchema = z.object({
  goal: z.string().optional(),
  reasoning: z.string().optional(),
  steps: z.array(RawStepSchema).min(1),
});

type RawStep = z.infer<typeof RawStepSchema>;

export class GenerativePlanBuilder implements PlanBuilder {
  constructor(
    private readonly client: GenerativeClient,
    private readonly guard: PrivacyGuard,
    private readonly warnings: Warning[] = [],
  ) {}

  async build(context: PlanContext): Promise<AgentPlan> {
    const { profile, graph, activatedRoles } = context;
    const data = await this.client.chatJson(
      buildSystemPrompt(activatedRoles),
      this.buildUserPrompt(context),
      { maxTokens: 4096 },
    );
    if (typeof data.parseError === "string") {
      throw new LLMError(`Plan response was not valid JSON: ${data.parseError}`);
    }
    const parsed = RawPlanSchema.safeParse(data);
    if (!parsed.success) {
      throw new LLMError(
        `Plan response did not match the plan schema: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
      );
    }

    const steps = normalizeSteps(parsed.data.steps, this.warnings);
    const last = steps[steps.length - 1];
    if (last.role !== "critic") {
      steps.push(criticStep(steps.length + 1, [last.stepNumber]));
    }

    return {
      planId: randomUUID(),
      createdAt: new Date().toISOString(),
      goal: parsed.data.goal ?? `Generate enhanced documentation for ${profile.repoName}`,
      steps,
      metadata: {
        repo: profile.repoName,
        entityCount: graph.entities.length,
        activatedRoles,
        strategy: "generative",
        reasoning: parsed.data.reasoning ?? "",
      },
    };
  }

  private buildUserPrompt({ profile, graph, priorResults }: PlanContext): string {
    const view = this.guard.sanitizeContext({
      repository: profile.repoName,
      url: profile.repoUrl,
      description: profile.description.slice(0, 300),
      language: profile.primaryLanguage,
      signals: profile.signals.map((s) => s.signalType),
      fileTree: profile.fileTree.slice(0, 30),
      fileCount: profile.fileTree.length,
      entities: graph.entities.slice(0, 25).map((e) => ({ id: e.id, name: e.name, type: e.entityType })),
      relations: graph.relations
        .slice(0, 20)
        .map((r) => `${r.sourceId} -${r.relationType}-> ${r.targetId}`),
    });

    const lines = [
      "Repository context:",
      JSON.stringify(view, null, 2),
    ];
    const failures = priorResults.filter((r) => !r.success);
    if (priorResults.length > 0) {
      lines.push(
        "",
        "A previous plan was rejected. Issues from the previous attempt:",
        ...failures.flatMap((r) => r.errors.map((e) => `- [${r.role}] ${e}`)),
      );
    }
    lines.push("", "Create a documentation enhancement plan. Always end with a critic validation step.");
    return lines.join("\n");
  }
}

function buildSystemPrompt(activatedRoles: SpecializedRole[]): string {
  const roles = activatedRoles.length > 0 ? activatedRoles.join(", ") : "none";
  return [
    "You are a documentation planning agent. You produce JSON execution plans",
    "for generating enhanced documentation from a source repository.",
    "",
    "Available tools:",
    describeTools(),
    "",
    `Activated specialized agents: ${roles}`,
    "",
    "Rules:",
    '1. Route domain work to the specialized agent roles: "service-topology" (containers, services),',
    '   "event-flow" (brokers, queues), "ml-pipeline" (models, training, inference),',
    '   "data-pipeline" (orchestration, transforms, warehouses), "infrastructure" (IaC, cloud).',
    '2. Use the "executor" role only for generic tool steps.',
    '3. Always end with a "critic" step.',
    "4. Each step produces a concrete documentation artifact.",
    "",
    "Return JSON with keys: goal (string), reasoning (string), steps (array of objects with:",
    "step_number, description, agent_role, tool_calls (array of {tool_name, parameters}),",
    "depends_on (array of step numbers), expected_output).",
  ].join("\n");
}

/**
 * Coerce unknown roles to executor, renumber steps 1..n and remap
 * dependencies; dependencies on steps that do not exist are dropped.
 */
function normalizeSteps(raw: RawStep[], warnings: Warning[]): PlanStep[] {
  const renumber = new Map<number, number>();
  raw.forEach((s, i) => {
    if (s.step_number !== undefined && !renumber.has(s.step_number)) {
      renumber.set(s.step_number, i + 1);
    }
  });

  return raw.map((s, i) => {
    const stepNumber = i + 1;
    const dependsOn: number[] = [];
    for (const dep of s.depends_on) {
      const mapped = renumber.get(dep);
      if (mapped === undefined || mapped === stepNumber) {
        warnings.push({
          level: "warn",
          module: "planner",
          message: `Step ${stepNumber} depends on unknown step ${dep}; dependency dropped`,
        });
      } else {
        dependsOn.push(mapped);
      }
    }
    return {
      stepNumber,
      description: s.description,
      role: coerceRole(s.agent_role),
      toolCalls: s.tool_calls.map((tc) =>
        newToolCall(tc.tool_name, tc.parameters, tc.expected_output_type),
      ),
      dependsOn,
      expectedOutput: s.expected_output,
      completed: false,
    };
  });
}

function coerceRole(value: string): AgentRole {
  const role = AGENT_ROLES.find((r) => r === value);
  return role === undefined || role === "planner" ? "executor" : role;
}

// ─── Planner ─────────────────────────────────────────────────────────────────

export interface PlannerOptions {
  client: GenerativeClient | null;
  guard: PrivacyGuard;
  warnings?: Warning[];
  verbose?: boolean;
}

export interface PlanRequest {
  profile: RepoProfile;
  graph: KnowledgeGraph;
  priorResults?: AgentResult[];
  iteration?: number;
  useGenerative?: boolean;
  /** Id of the rejected plan this one replaces. */
  replanOf?: string;
}

export class Planner {
  private readonly heuristic = new HeuristicPlanBuilder();
  private readonly generative: GenerativePlanBuilder | null;
  private readonly warnings: Warning[];
  private readonly verbose: boolean;

  constructor(options: PlannerOptions) {
    this.warnings = options.warnings ?? [];
    this.verbose = options.verbose ?? false;
    this.generative = options.client
      ? new GenerativePlanBuilder(options.client, options.guard, this.warnings)
      : null;
  }

  /**
   * Build a plan. Throws PlannerError only when no strategy produced one.
   */
  async plan(request: PlanRequest): Promise<{ plan: AgentPlan; result: AgentResult }> {
    const start = performance.now();
    const context: PlanContext = {
      profile: request.profile,
      graph: request.graph,
      activatedRoles: detectActivatedRoles(request.profile),
      priorResults: request.priorResults ?? [],
      iteration: request.iteration ?? 1,
    };

    const generative = this.generative;
    let outcome: FallbackOutcome<AgentPlan>;
    try {
      outcome = await withFallback(
        request.useGenerative !== false && generative ? () => generative.build(context) : null,
        () => this.heuristic.build(context),
        (message) => {
          this.warnings.push({
            level: "warn",
            module: "planner",
            message: `Generative planning failed, using template plan: ${message}`,
          });
        },
      );
    } catch (err) {
      throw new PlannerError(
        `Could not build a plan: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    const plan = outcome.value;
    plan.metadata.iteration = context.iteration;
    if (request.replanOf) plan.metadata.replanOf = request.replanOf;
    vlog(this.verbose, `Plan ${plan.planId}: ${plan.steps.length} steps (${String(plan.metadata.strategy)})`);

    return {
      plan,
      result: makeResult("planner", {
        artifacts: { plan },
        durationMs: elapsedMs(start),
        warnings: outcome.error ? [outcome.error] : [],
        metadata: {
          activatedRoles: context.activatedRoles,
          generativeUsed: !outcome.usedFallback,
        },
      }),
    };
  }
}
