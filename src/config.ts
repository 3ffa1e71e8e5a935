// src/config.ts — Config Resolver
// defaults ← config file ← environment ← CLI flags. Bad values warn and keep the default.

import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import type { PrivacyMode, PublicConfig, ResolvedConfig, Warning } from "./types.js";
import {
  ConfigError,
  DEFAULT_MAX_ASSUMPTIONS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_MIN_COVERAGE_PCT,
} from "./types.js";
import { isPrivacyMode, isRecord, PRIVACY_MODES } from "./privacy-guard.js";

export const CONFIG_FILENAME = "docloop.config.json";
export const PACKAGE_JSON_KEY = "docloop";
export const DEFAULT_MODEL = "claude-sonnet-4-20250514";

export type Command = "run" | "diff" | "help";

export interface ParsedArgs {
  command: Command;
  positionals: string[];
  config?: string;
  output?: string;
  graph?: string;
  profile?: string;
  privacy?: string;
  base?: string;
  head?: string;
  version?: string;
  maxRetries?: string;
  noLlm: boolean;
  quiet: boolean;
  verbose: boolean;
  help: boolean;
}

export type Env = Readonly<Record<string, string | undefined>>;

function defaults(): ResolvedConfig {
  return {
    privacyMode: "standard",
    maxRetries: DEFAULT_MAX_RETRIES,
    minCoveragePct: DEFAULT_MIN_COVERAGE_PCT,
    maxAssumptions: DEFAULT_MAX_ASSUMPTIONS,
    useGenerative: true,
    llm: {
      provider: "anthropic",
      model: DEFAULT_MODEL,
      maxOutputTokens: 4096,
    },
    output: { dir: "." },
    verbose: false,
  };
}

/**
 * Resolve config from CLI args, config file, environment and defaults.
 */
export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
  env: Env = process.env,
  cwd: string = process.cwd(),
): ResolvedConfig {
  const config = defaults();
  const file = loadConfigFile(args.config, cwd, warnings);

  if (file) {
    config.privacyMode = privacyOption(file.privacyMode, config.privacyMode, "privacyMode", warnings);
    config.maxRetries = integerOption(file.maxRetries, config.maxRetries, "maxRetries", 0, warnings);
    config.minCoveragePct = percentOption(file.minCoveragePct, config.minCoveragePct, warnings);
    config.maxAssumptions = integerOption(file.maxAssumptions, config.maxAssumptions, "maxAssumptions", 0, warnings);
    if (typeof file.useGenerative === "boolean") config.useGenerative = file.useGenerative;
    if (isRecord(file.llm)) {
      if (typeof file.llm.model === "string") config.llm.model = file.llm.model;
      if (typeof file.llm.baseUrl === "string") config.llm.baseUrl = file.llm.baseUrl;
      config.llm.maxOutputTokens = integerOption(
        file.llm.maxOutputTokens, config.llm.maxOutputTokens, "llm.maxOutputTokens", 1, warnings,
      );
      if (typeof file.llm.apiKey === "string") config.llm.apiKey = file.llm.apiKey;
    }
    if (isRecord(file.output) && typeof file.output.dir === "string") config.output.dir = file.output.dir;
    if (typeof file.verbose === "boolean") config.verbose = file.verbose;
  }

  if (env.ANTHROPIC_API_KEY) config.llm.apiKey = env.ANTHROPIC_API_KEY;
  if (env.DOCLOOP_LLM_MODEL) config.llm.model = env.DOCLOOP_LLM_MODEL;
  if (env.DOCLOOP_PRIVACY_MODE !== undefined) {
    config.privacyMode = privacyOption(env.DOCLOOP_PRIVACY_MODE, config.privacyMode, "DOCLOOP_PRIVACY_MODE", warnings);
  }

  if (args.privacy !== undefined) {
    config.privacyMode = privacyOption(args.privacy, config.privacyMode, "--privacy", warnings);
  }
  if (args.maxRetries !== undefined) {
    config.maxRetries = integerOption(Number(args.maxRetries), config.maxRetries, "--max-retries", 0, warnings);
  }
  if (args.output) config.output.dir = args.output;
  if (args.noLlm) config.useGenerative = false;
  if (args.verbose) config.verbose = true;

  config.output.dir = resolve(cwd, config.output.dir);
  return config;
}

/**
 * Config with the API key removed, safe to print or serialize.
 */
export function publicConfig(config: ResolvedConfig): PublicConfig {
  const { apiKey: _apiKey, ...llm } = config.llm;
  return { ...config, llm };
}

// ─── Config file ─────────────────────────────────────────────────────────────

function loadConfigFile(
  configPath: string | undefined,
  cwd: string,
  warnings: Warning[],
): Record<string, unknown> | null {
  if (configPath) {
    const absPath = resolve(cwd, configPath);
    if (!existsSync(absPath)) {
      warnings.push({ level: "warn", module: "config", message: `Config file not found: ${configPath}` });
      return null;
    }
    return parseConfigFile(absPath, warnings);
  }

  const jsonConfig = join(cwd, CONFIG_FILENAME);
  if (existsSync(jsonConfig)) return parseConfigFile(jsonConfig, warnings);

  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    const pkg = parseConfigFile(pkgJson, warnings);
    const section = pkg?.[PACKAGE_JSON_KEY];
    if (isRecord(section)) return checkApiKey(section, warnings);
  }
  return null;
}

function parseConfigFile(filePath: string, warnings: Warning[]): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
    if (!isRecord(parsed)) {
      warnings.push({ level: "warn", module: "config", message: `Config file ${filePath} is not a JSON object` });
      return null;
    }
    return filePath.endsWith("package.json") ? parsed : checkApiKey(parsed, warnings);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({ level: "warn", module: "config", message: `Failed to parse config file ${filePath}: ${msg}` });
    return null;
  }
}

function checkApiKey(config: Record<string, unknown>, warnings: Warning[]): Record<string, unknown> {
  if (isRecord(config.llm) && config.llm.apiKey) {
    warnings.push({
      level: "warn",
      module: "config",
      message:
        "API keys should not be stored in config files. Use ANTHROPIC_API_KEY environment variable instead.",
    });
  }
  return config;
}

// ─── Value checks ────────────────────────────────────────────────────────────

function privacyOption(value: unknown, fallback: PrivacyMode, name: string, warnings: Warning[]): PrivacyMode {
  if (value === undefined) return fallback;
  if (isPrivacyMode(value)) return value;
  warnings.push({
    level: "warn",
    module: "config",
    message: `Invalid ${name} "${String(value)}" (expected ${PRIVACY_MODES.join(", ")}); using ${fallback}`,
  });
  return fallback;
}

function integerOption(value: unknown, fallback: number, name: string, min: number, warnings: Warning[]): number {
  if (value === undefined) return fallback;
  if (typeof value === "number" && Number.isInteger(value) && value >= min) return value;
  warnings.push({
    level: "warn",
    module: "config",
    message: `Invalid ${name} "${String(value)}" (expected an integer >= ${min}); using ${fallback}`,
  });
  return fallback;
}

function percentOption(value: unknown, fallback: number, warnings: Warning[]): number {
  if (value === undefined) return fallback;
  if (typeof value === "number" && value >= 0 && value <= 100) return value;
  warnings.push({
    level: "warn",
    module: "config",
    message: `Invalid minCoveragePct "${String(value)}" (expected 0-100); using ${fallback}`,
  });
  return fallback;
}

// ─── CLI args ────────────────────────────────────────────────────────────────

function optionalString(value: unknown): string | undefined {
  if (value === undefined || value === null || value === true || value === false) return undefined;
  return String(value);
}

/**
 * Parse CLI args using mri. The first positional names the command.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { c: "config", o: "output", g: "graph", p: "profile", q: "quiet", v: "verbose", h: "help" },
    boolean: ["quiet", "verbose", "help"],
    string: ["config", "output", "graph", "profile", "privacy", "base", "head", "version", "max-retries"],
  });

  const positionals = args._.map(String);
  const [first, ...rest] = positionals;
  let command: Command;
  if (first === undefined) command = "help";
  else if (first === "run" || first === "diff" || first === "help") command = first;
  else throw new ConfigError(`Unknown command: ${first}`);

  return {
    command,
    positionals: rest,
    config: optionalString(args.config),
    output: optionalString(args.output),
    graph: optionalString(args.graph),
    profile: optionalString(args.profile),
    privacy: optionalString(args.privacy),
    base: optionalString(args.base),
    head: optionalString(args.head),
    version: optionalString(args.version),
    maxRetries: optionalString(args["max-retries"]),
    // mri reads --no-llm as llm: false
    noLlm: args.llm === false,
    quiet: args.quiet === true,
    verbose: args.verbose === true,
    help: args.help === true || command === "help",
  };
}
