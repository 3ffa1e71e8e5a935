import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ParsedArgs } from "../src/config.js";
import { parseCliArgs, publicConfig, resolveConfig } from "../src/config.js";
import type { Warning } from "../src/types.js";
import { ConfigError } from "../src/types.js";

function args(overrides: Partial<ParsedArgs> = {}): ParsedArgs {
  return { command: "run", positionals: [], noLlm: false, quiet: false, verbose: false, help: false, ...overrides };
}

let cwd: string;

beforeEach(() => {
  cwd = mkdtempSync(join(tmpdir(), "docloop-config-"));
});

afterEach(() => {
  rmSync(cwd, { recursive: true, force: true });
});

describe("resolveConfig", () => {
  it("uses defaults when nothing is configured", () => {
    const warnings: Warning[] = [];
    const config = resolveConfig(args(), warnings, {}, cwd);
    expect(config.privacyMode).toBe("standard");
    expect(config.maxRetries).toBe(2);
    expect(config.useGenerative).toBe(true);
    expect(config.llm.apiKey).toBeUndefined();
    expect(config.output.dir).toBe(cwd);
    expect(warnings).toEqual([]);
  });

  it("layers file, environment and CLI flags in that order", () => {
    writeFileSync(
      join(cwd, "docloop.config.json"),
      JSON.stringify({ privacyMode: "permissive", maxRetries: 4, llm: { model: "file-model" }, output: { dir: "out" } }),
    );
    const config = resolveConfig(
      args({ privacy: "strict" }),
      [],
      { DOCLOOP_PRIVACY_MODE: "standard", DOCLOOP_LLM_MODEL: "env-model", ANTHROPIC_API_KEY: "test-secret" },
      cwd,
    );
    expect(config.privacyMode).toBe("strict");
    expect(config.maxRetries).toBe(4);
    expect(config.llm.model).toBe("env-model");
    expect(config.llm.apiKey).toBe("test-secret");
    expect(config.output.dir).toBe(join(cwd, "out"));
  });

  it("reads the docloop key from package.json", () => {
    writeFileSync(join(cwd, "package.json"), JSON.stringify({ name: "shop", docloop: { maxAssumptions: 7 } }));
    expect(resolveConfig(args(), [], {}, cwd).maxAssumptions).toBe(7);
  });

  it("warns on invalid values and keeps the previous one", () => {
    writeFileSync(join(cwd, "docloop.config.json"), JSON.stringify({ minCoveragePct: 140, maxRetries: -1 }));
    const warnings: Warning[] = [];
    const config = resolveConfig(args({ privacy: "paranoid" }), warnings, {}, cwd);
    expect(config.minCoveragePct).toBe(80);
    expect(config.maxRetries).toBe(2);
    expect(config.privacyMode).toBe("standard");
    expect(warnings.map((w) => w.message)).toEqual([
      'Invalid maxRetries "-1" (expected an integer >= 0); using 2',
      'Invalid minCoveragePct "140" (expected 0-100); using 80',
      'Invalid --privacy "paranoid" (expected strict, standard, permissive); using standard',
    ]);
  });

  it("warns when a config file carries an API key", () => {
    writeFileSync(join(cwd, "docloop.config.json"), JSON.stringify({ llm: { apiKey: "test-secret" } }));
    const warnings: Warning[] = [];
    const config = resolveConfig(args(), warnings, {}, cwd);
    expect(config.llm.apiKey).toBe("test-secret");
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message).toContain("ANTHROPIC_API_KEY");
  });

  it("warns about a missing explicit config file", () => {
    const warnings: Warning[] = [];
    resolveConfig(args({ config: "missing.json" }), warnings, {}, cwd);
    expect(warnings.map((w) => w.message)).toEqual(["Config file not found: missing.json"]);
  });

  it("disables generative assistance with --no-llm", () => {
    expect(resolveConfig(args({ noLlm: true }), [], {}, cwd).useGenerative).toBe(false);
  });

  it("parses --max-retries as an integer", () => {
    expect(resolveConfig(args({ maxRetries: "0" }), [], {}, cwd).maxRetries).toBe(0);
  });
});

describe("publicConfig", () => {
  it("drops the API key", () => {
    const config = resolveConfig(args(), [], { ANTHROPIC_API_KEY: "test-secret" }, cwd);
    const safe = publicConfig(config);
    expect("apiKey" in safe.llm).toBe(false);
    expect(JSON.stringify(safe)).not.toContain("test-secret");
    expect(config.llm.apiKey).toBe("test-secret");
  });
});

describe("parseCliArgs", () => {
  it("defaults to help without a command", async () => {
    const parsed = await parseCliArgs([]);
    expect(parsed.command).toBe("help");
    expect(parsed.help).toBe(true);
  });

  it("parses run options", async () => {
    const parsed = await parseCliArgs(["run", "repo", "-g", "graph.json", "--privacy", "strict", "--no-llm", "-v"]);
    expect(parsed).toMatchObject({
      command: "run",
      positionals: ["repo"],
      graph: "graph.json",
      privacy: "strict",
      noLlm: true,
      verbose: true,
      help: false,
    });
  });

  it("parses diff refs and version", async () => {
    const parsed = await parseCliArgs(["diff", "--base", "v1.0.0", "--head", "main", "--version", "1.1.0"]);
    expect(parsed).toMatchObject({ command: "diff", base: "v1.0.0", head: "main", version: "1.1.0" });
  });

  it("rejects unknown commands", async () => {
    await expect(parseCliArgs(["deploy"])).rejects.toBeInstanceOf(ConfigError);
  });
});
