// src/agent-result.ts — Uniform AgentResult construction

import type { AgentResult, AgentRole } from "./types.js";

export function makeResult(
  role: AgentRole,
  fields: Partial<Omit<AgentResult, "role">> = {},
): AgentResult {
  return {
    role,
    success: fields.success ?? true,
    artifacts: fields.artifacts ?? {},
    evidenceIds: fields.evidenceIds ?? [],
    errors: fields.errors ?? [],
    warnings: fields.warnings ?? [],
    durationMs: fields.durationMs ?? 0,
    metadata: fields.metadata ?? {},
  };
}

export function elapsedMs(start: number): number {
  return Math.round((performance.now() - start) * 100) / 100;
}
