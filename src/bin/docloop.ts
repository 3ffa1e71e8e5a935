#!/usr/bin/env node
// CLI entry point for docloop

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { z } from "zod";
import type { ParsedArgs } from "../config.js";
import { parseCliArgs, publicConfig, resolveConfig } from "../config.js";
import type { ResolvedConfig, Warning } from "../types.js";
import { ConfigError, ENGINE_VERSION } from "../types.js";
import { KnowledgeGraph } from "../knowledge-graph.js";
import { buildRepoProfile } from "../repo-profile.js";
import type { RepoProfileOverrides } from "../repo-profile.js";
import { orchestrate, summarizeOrchestration } from "../orchestrator.js";
import { createGenerativeClient } from "../llm/client.js";
import { createLocalAdapters } from "../tools/index.js";
import { GitDiffProvider } from "../diff/diff-collector.js";
import { runDiffPipeline } from "../diff/pipeline.js";
import { coverageSummary } from "../evidence-registry.js";

export const ARTIFACTS_FILENAME = "docloop-artifacts.json";
export const CHANGELOG_FILENAME = "CHANGELOG.fragment.md";

const HELP_TEXT = `
docloop v${ENGINE_VERSION}

Usage:
  docloop run [repoDir] --graph <graph.json>     Plan, execute and validate documentation artifacts
  docloop diff [repoDir] --base <ref> --head <ref> --graph <graph.json>
                                                 Impact report and release notes for a ref range

Options:
  --graph, -g          Knowledge graph JSON ({ entities, relations })
  --profile, -p        JSON overrides for the repository profile (repoName, description, ...)
  --privacy            Privacy mode: strict, standard (default), permissive
  --max-retries        Replanning attempts after a rejected verdict (default 2)
  --no-llm             Use deterministic strategies only
  --base, --head       Git refs to compare (diff)
  --version            Release version for the notes heading (diff)
  --output, -o         Output directory (default: current directory)
  --config, -c         Path to config file (default: docloop.config.json)
  --quiet, -q          Suppress warnings
  --verbose, -v        Print progress to stderr
  --help, -h           Show this help text

Environment Variables:
  ANTHROPIC_API_KEY    Enables the generative collaborator
  DOCLOOP_LLM_MODEL    Model id
  DOCLOOP_PRIVACY_MODE Privacy mode
`.trim();

const ProfileOverridesSchema = z
  .object({
    repoName: z.string(),
    repoUrl: z.string(),
    description: z.string(),
    primaryLanguage: z.string(),
    languages: z.array(z.string()),
    readmeSummary: z.string(),
    license: z.string(),
    topics: z.array(z.string()),
  })
  .partial();

async function main(): Promise<number> {
  const args = await parseCliArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(HELP_TEXT + "\n");
    return 0;
  }

  const warnings: Warning[] = [];
  const config = resolveConfig(args, warnings);
  if (config.verbose) {
    process.stderr.write(`[INFO] Config: ${JSON.stringify(publicConfig(config))}\n`);
  }

  const repoDir = resolve(args.positionals[0] ?? ".");
  const code = args.command === "diff"
    ? await runDiff(args, config, repoDir, warnings)
    : await runOrchestration(args, config, repoDir, warnings);

  if (!args.quiet) {
    for (const w of warnings) {
      process.stderr.write(`[${w.level}] ${w.module}: ${w.message}\n`);
    }
  }
  return code;
}

async function runOrchestration(
  args: ParsedArgs,
  config: ResolvedConfig,
  repoDir: string,
  warnings: Warning[],
): Promise<number> {
  const graph = loadGraph(args.graph, warnings);
  const profile = buildRepoProfile(repoDir, loadProfileOverrides(args.profile), warnings);

  const result = await orchestrate(
    { profile, graph },
    {
      privacyMode: config.privacyMode,
      maxRetries: config.maxRetries,
      minCoveragePct: config.minCoveragePct,
      maxAssumptions: config.maxAssumptions,
      useGenerative: config.useGenerative,
      client: config.llm.apiKey ? createGenerativeClient(config.llm) : null,
      adapters: createLocalAdapters({ rootDir: repoDir, files: profile.fileTree }),
      warnings,
      verbose: config.verbose,
    },
  );

  const outputPath = resolve(config.output.dir, ARTIFACTS_FILENAME);
  writeFileSafe(
    outputPath,
    JSON.stringify(
      {
        approved: result.approved,
        iterations: result.iterations,
        reasons: result.reasons,
        coverage: result.coverage.map(coverageSummary),
        artifacts: result.artifacts,
      },
      null,
      2,
    ),
  );
  process.stdout.write(summarizeOrchestration(result) + "\n");
  if (!args.quiet) process.stderr.write(`Written to ${outputPath}\n`);
  return result.approved ? 0 : 1;
}

async function runDiff(
  args: ParsedArgs,
  config: ResolvedConfig,
  repoDir: string,
  warnings: Warning[],
): Promise<number> {
  if (!args.base || !args.head) throw new ConfigError("diff requires --base and --head");
  const graph = loadGraph(args.graph, warnings);

  const result = await runDiffPipeline({
    provider: new GitDiffProvider(),
    repo: repoDir,
    baseRef: args.base,
    headRef: args.head,
    graph,
    version: args.version,
    verbose: config.verbose,
  });
  warnings.push(...result.warnings);
  if (!result.success) return 1;

  const outputPath = resolve(config.output.dir, CHANGELOG_FILENAME);
  writeFileSafe(outputPath, result.markdown);
  process.stdout.write(JSON.stringify({ impact: result.impact, regeneration: result.regeneration }, null, 2) + "\n");
  if (!args.quiet) process.stderr.write(`Written to ${outputPath}\n`);
  return 0;
}

function loadGraph(path: string | undefined, warnings: Warning[]): KnowledgeGraph {
  if (!path) {
    warnings.push({ level: "warn", module: "cli", message: "No --graph given; using an empty knowledge graph" });
    return new KnowledgeGraph();
  }
  return KnowledgeGraph.fromJSON(readJson(path), warnings);
}

function loadProfileOverrides(path: string | undefined): RepoProfileOverrides {
  if (!path) return {};
  const parsed = ProfileOverridesSchema.safeParse(readJson(path));
  if (!parsed.success) {
    throw new ConfigError(`Invalid profile ${path}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }
  return parsed.data;
}

function readJson(path: string): unknown {
  const abs = resolve(path);
  if (!existsSync(abs)) throw new ConfigError(`File not found: ${path}`);
  try {
    return JSON.parse(readFileSync(abs, "utf-8"));
  } catch (err: unknown) {
    throw new ConfigError(`Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function writeFileSafe(filePath: string, content: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    process.stderr.write(`Fatal error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(err instanceof ConfigError ? 2 : 1);
  },
);
