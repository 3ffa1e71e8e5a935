// src/executor.ts — Executor: runs a plan step's tool calls through adapters
// Contract validation → privacy check → adapter dispatch → evidence registration.
// A failing tool call never aborts its step or the run.

import { z } from "zod";
import type { AgentResult, PlanStep, ToolCall, Warning } from "./types.js";
import { EVIDENCE_TYPES } from "./types.js";
import type { EvidenceRegistry } from "./evidence-registry.js";
import { createClaim, createEvidencePointer } from "./evidence-registry.js";
import type { PrivacyGuard } from "./privacy-guard.js";
import { isRecord } from "./privacy-guard.js";
import type { ToolAdapterRegistry } from "./tool-contracts.js";
import { getContract, validateParams } from "./tool-contracts.js";
import { elapsedMs, makeResult } from "./agent-result.js";
import { vlog } from "./log.js";

const EmbeddedPointerSchema = z.object({
  id: z.string().min(1).optional(),
  evidenceType: z.enum(EVIDENCE_TYPES),
  sourcePath: z.string().optional(),
  section: z.string().optional(),
  snippet: z.string().optional(),
  lineStart: z.number().int().optional(),
  lineEnd: z.number().int().optional(),
  commitSha: z.string().optional(),
  url: z.string().optional(),
  confidence: z.number().optional(),
  metadata: z.record(z.unknown()).optional(),
});

export interface ExecutorOptions {
  adapters: ToolAdapterRegistry;
  registry: EvidenceRegistry;
  guard: PrivacyGuard;
  warnings?: Warning[];
  verbose?: boolean;
}

/** Artifact id under which a step's claims are registered. */
export function stepArtifactId(step: PlanStep): string {
  return `step-${step.stepNumber}`;
}

export class Executor {
  constructor(private readonly options: ExecutorOptions) {}

  /**
   * Execute every tool call of the step, in order. The returned result is
   * successful when no call failed; skipped calls only warn.
   */
  async executeStep(step: PlanStep | undefined, priorResults: AgentResult[] = []): Promise<AgentResult> {
    const start = performance.now();
    if (!step) {
      return makeResult("executor", { success: false, errors: ["No plan step provided to executor"] });
    }

    const artifacts: Record<string, unknown> = {};
    const evidenceIds: string[] = [];
    const errors: string[] = [];
    const warnings: string[] = [];
    // A replanned step reuses its number; its claims describe this execution only
    this.options.registry.resetArtifact(stepArtifactId(step));

    for (const call of step.toolCalls) {
      await this.runCall(call);
      if (call.status === "success") {
        artifacts[call.id] = call.result;
        evidenceIds.push(...call.evidenceIds);
        this.options.registry.registerClaim(
          createClaim({
            text: `${call.toolName} produced ${call.expectedOutputType} output for step ${step.stepNumber}`,
            artifactId: stepArtifactId(step),
            evidenceIds: call.evidenceIds,
          }),
        );
      } else if (call.status === "failed") {
        errors.push(`Tool ${call.toolName} failed: ${call.error ?? "unknown error"}`);
      } else if (call.status === "skipped") {
        warnings.push(call.error ?? `Tool ${call.toolName} skipped`);
      }
    }

    vlog(
      this.options.verbose ?? false,
      `Step ${step.stepNumber}: ${step.toolCalls.length} tool call(s), ${errors.length} failed`,
    );

    return makeResult("executor", {
      success: errors.length === 0,
      artifacts,
      evidenceIds,
      errors,
      warnings,
      durationMs: elapsedMs(start),
      metadata: {
        stepNumber: step.stepNumber,
        priorResultCount: priorResults.length,
        toolCalls: step.toolCalls.map((c) => ({ id: c.id, toolName: c.toolName, status: c.status })),
      },
    });
  }

  private async runCall(call: ToolCall): Promise<void> {
    const contract = getContract(call.toolName);
    if (contract) {
      const violations = validateParams(contract, call.parameters);
      if (violations.length > 0) {
        call.status = "failed";
        call.error = violations.join("; ");
        return;
      }
      if (!this.options.guard.permits(contract.privacyLevel)) {
        call.status = "skipped";
        call.error = `Tool ${call.toolName} requires ${contract.privacyLevel} privacy mode (active: ${this.options.guard.mode})`;
        return;
      }
    }

    const adapter = this.options.adapters.get(call.toolName);
    if (!adapter) {
      call.status = "skipped";
      call.error = `No adapter registered for tool: ${call.toolName}`;
      return;
    }

    try {
      call.result = await adapter.execute(call.parameters);
      call.status = "success";
    } catch (err) {
      call.status = "failed";
      call.error = err instanceof Error ? err.message : String(err);
      return;
    }

    this.registerEmbeddedEvidence(call);
  }

  private registerEmbeddedEvidence(call: ToolCall): void {
    if (!isRecord(call.result) || call.result.evidencePointer === undefined) return;
    const parsed = EmbeddedPointerSchema.safeParse(call.result.evidencePointer);
    if (!parsed.success) {
      this.options.warnings?.push({
        level: "warn",
        module: "executor",
        message: `Tool ${call.toolName} returned a malformed evidence pointer; not registered`,
      });
      return;
    }
    const id = this.options.registry.registerPointer(createEvidencePointer(parsed.data));
    call.evidenceIds.push(id);
  }
}
