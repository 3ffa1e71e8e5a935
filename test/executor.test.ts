import { describe, it, expect, vi } from "vitest";
import { Executor, stepArtifactId } from "../src/executor.js";
import { EvidenceRegistry } from "../src/evidence-registry.js";
import { PrivacyGuard } from "../src/privacy-guard.js";
import { newToolCall } from "../src/planner.js";
import type { ToolAdapter, ToolAdapterRegistry } from "../src/tool-contracts.js";
import type { PlanStep, PrivacyMode, ToolCall, Warning } from "../src/types.js";

function stepWith(...toolCalls: ToolCall[]): PlanStep {
  return { stepNumber: 3, description: "tools", role: "executor", toolCalls, dependsOn: [], expectedOutput: "", completed: false };
}

function adapter(result: unknown): ToolAdapter {
  return { execute: vi.fn().mockResolvedValue(result) };
}

function setup(adapters: ToolAdapterRegistry, mode: PrivacyMode = "standard") {
  const registry = new EvidenceRegistry();
  const warnings: Warning[] = [];
  const executor = new Executor({ adapters, registry, guard: new PrivacyGuard(mode), warnings });
  return { registry, warnings, executor };
}

describe("Executor", () => {
  it("fails without a step", async () => {
    const { executor } = setup(new Map());
    const result = await executor.executeStep(undefined);
    expect(result.success).toBe(false);
    expect(result.errors).toEqual(["No plan step provided to executor"]);
  });

  it("registers embedded evidence and a backed claim per successful call", async () => {
    const search = adapter({
      matches: [],
      evidencePointer: { evidenceType: "config_file", sourcePath: "docker-compose.yml", snippet: "services:" },
    });
    const { executor, registry } = setup(new Map([["repo.search", search]]));
    const call = newToolCall("repo.search", { query: "docker" });
    const result = await executor.executeStep(stepWith(call));

    expect(result.success).toBe(true);
    expect(call.status).toBe("success");
    expect(call.evidenceIds).toHaveLength(1);
    expect(result.evidenceIds).toEqual(call.evidenceIds);
    expect(result.artifacts[call.id]).toMatchObject({ matches: [] });
    expect(registry.getPointer(call.evidenceIds[0])?.sourcePath).toBe("docker-compose.yml");

    const claims = registry.claimsForArtifact("step-3");
    expect(claims).toHaveLength(1);
    expect(claims[0].isAssumption).toBe(false);
    expect(claims[0].text).toBe("repo.search produced json output for step 3");
  });

  it("fails a call whose parameters violate the contract", async () => {
    const search = adapter({});
    const { executor } = setup(new Map([["repo.search", search]]));
    const call = newToolCall("repo.search", {});
    const result = await executor.executeStep(stepWith(call));
    expect(call.status).toBe("failed");
    expect(result.success).toBe(false);
    expect(result.errors).toEqual(["Tool repo.search failed: Missing required parameter: query"]);
    expect(search.execute).not.toHaveBeenCalled();
  });

  it("skips tools without an adapter and tools the privacy mode forbids", async () => {
    const read = adapter({});
    const { executor } = setup(new Map([["repo.read", read]]));
    const refine = newToolCall("docx.refine", { instructions: "x", references_to_kg: [] }, "docx");
    const readCall = newToolCall("repo.read", { path: "a.ts" });
    const result = await executor.executeStep(stepWith(refine, readCall));

    expect(result.success).toBe(true);
    expect(refine.status).toBe("skipped");
    expect(readCall.status).toBe("skipped");
    expect(result.warnings).toEqual([
      "No adapter registered for tool: docx.refine",
      "Tool repo.read requires permissive privacy mode (active: standard)",
    ]);
    expect(read.execute).not.toHaveBeenCalled();
  });

  it("keeps running after an adapter throws", async () => {
    const broken: ToolAdapter = { execute: vi.fn().mockRejectedValue(new Error("disk gone")) };
    const diagram = adapter({ rendered: false });
    const { executor, registry } = setup(new Map([["repo.summarize", broken], ["diagram.render", diagram]]));
    const first = newToolCall("repo.summarize", { path: "." });
    const second = newToolCall("diagram.render", { type: "mermaid", spec: "graph LR" });
    const result = await executor.executeStep(stepWith(first, second));

    expect(result.success).toBe(false);
    expect(result.errors).toEqual(["Tool repo.summarize failed: disk gone"]);
    expect(second.status).toBe("success");
    expect(registry.claimsForArtifact(stepArtifactId(stepWith()))[0].isAssumption).toBe(true);
  });

  it("warns about a malformed evidence pointer", async () => {
    const { executor, warnings } = setup(new Map([["repo.search", adapter({ evidencePointer: { evidenceType: "rumor" } })]]));
    const call = newToolCall("repo.search", { query: "x" });
    await executor.executeStep(stepWith(call));
    expect(call.evidenceIds).toEqual([]);
    expect(warnings.map((w) => w.message)).toEqual([
      "Tool repo.search returned a malformed evidence pointer; not registered",
    ]);
  });

  it("records tool call statuses in metadata", async () => {
    const { executor } = setup(new Map());
    const call = newToolCall("image.generate", { prompt: "logo" });
    const result = await executor.executeStep(stepWith(call), []);
    expect(result.metadata.toolCalls).toEqual([{ id: call.id, toolName: "image.generate", status: "skipped" }]);
    expect(result.metadata.stepNumber).toBe(3);
  });

  it("keeps one claim per call when a step runs again", async () => {
    const search = adapter({ matches: [] });
    const { executor, registry } = setup(new Map([["repo.search", search]]));
    await executor.executeStep(stepWith(newToolCall("repo.search", { query: "docker" })));
    await executor.executeStep(stepWith(newToolCall("repo.search", { query: "docker" })));
    expect(registry.claimsForArtifact("step-3")).toHaveLength(1);
  });
});
