// src/tools/repo-tools.ts — Local repository tool adapters
// repo.search, repo.read, repo.summarize and repo.diff over a checkout on disk.
// Each result embeds an evidencePointer the executor registers.

import { readFileSync, statSync } from "node:fs";
import { extname, resolve, sep } from "node:path";
import picomatch from "picomatch";
import { z } from "zod";
import type { EvidenceType } from "../types.js";
import type { ToolAdapter } from "../tool-contracts.js";
import type { DiffProvider } from "../diff/diff-collector.js";
import { collectDiff } from "../diff/diff-collector.js";

const MAX_SEARCH_BYTES = 256 * 1024;
const MAX_READ_LINES = 500;

const TEXT_EXTENSIONS = new Set([
  ".md", ".txt", ".rst", ".json", ".yml", ".yaml", ".toml", ".ini", ".cfg", ".conf", ".env",
  ".ts", ".tsx", ".js", ".jsx", ".mjs", ".cjs", ".py", ".go", ".rs", ".java", ".kt", ".rb",
  ".cs", ".c", ".h", ".cpp", ".php", ".scala", ".swift", ".sh", ".sql", ".tf", ".hcl", ".proto",
  ".graphql", ".xml", ".html", ".css",
]);

const CONFIG_FILE = /(^|\/)(Dockerfile|Makefile|Chart\.yaml|[^/]+\.(ya?ml|toml|ini|cfg|conf|tf|json))$/i;

function evidenceTypeFor(path: string): EvidenceType {
  if (/(^|\/)readme(\.[a-z]+)?$/i.test(path)) return "readme_section";
  return CONFIG_FILE.test(path) ? "config_file" : "code_file";
}

function isTextFile(path: string): boolean {
  const base = path.split("/").pop() ?? path;
  return TEXT_EXTENSIONS.has(extname(base).toLowerCase()) || !base.includes(".");
}

/**
 * Queries are regular expressions; one that does not compile is matched literally.
 */
function queryRegExp(query: string): RegExp {
  try {
    return new RegExp(query, "i");
  } catch {
    // Invalid pattern: treat the query as plain text
    return new RegExp(query.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"), "i");
  }
}

/**
 * Resolve a repo-relative path, refusing anything that escapes the root.
 */
function resolveInside(rootDir: string, path: string): string {
  const root = resolve(rootDir);
  const abs = resolve(root, path);
  if (abs !== root && !abs.startsWith(root + sep)) {
    throw new Error(`Path escapes the repository: ${path}`);
  }
  return abs;
}

// ─── repo.search ─────────────────────────────────────────────────────────────

const SearchParams = z.object({
  query: z.string(),
  file_pattern: z.string().default("**/*"),
  max_results: z.number().int().positive().default(20),
});

export interface SearchMatch {
  path: string;
  line: number;
  snippet: string;
}

export class RepoSearchTool implements ToolAdapter {
  constructor(
    private readonly rootDir: string,
    private readonly files: readonly string[],
  ) {}

  async execute(params: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { query, file_pattern, max_results } = SearchParams.parse(params);
    const pattern = queryRegExp(query);
    const inScope = picomatch(file_pattern, { dot: true });
    const matches: SearchMatch[] = [];

    for (const path of this.files) {
      if (matches.length >= max_results) break;
      if (!inScope(path)) continue;
      if (pattern.test(path)) {
        matches.push({ path, line: 0, snippet: path });
        continue;
      }
      const hit = this.searchContent(path, pattern);
      if (hit) matches.push(hit);
    }

    const first = matches[0];
    return {
      query,
      matches,
      total: matches.length,
      ...(first && {
        evidencePointer: {
          evidenceType: evidenceTypeFor(first.path),
          sourcePath: first.path,
          snippet: first.snippet,
          lineStart: first.line > 0 ? first.line : undefined,
          confidence: 0.8,
          metadata: { query, total: matches.length },
        },
      }),
    };
  }

  private searchContent(path: string, pattern: RegExp): SearchMatch | null {
    if (!isTextFile(path)) return null;
    const abs = resolveInside(this.rootDir, path);
    try {
      if (statSync(abs).size > MAX_SEARCH_BYTES) return null;
      const lines = readFileSync(abs, "utf-8").split(/\r?\n/);
      const index = lines.findIndex((line) => pattern.test(line));
      if (index === -1) return null;
      return { path, line: index + 1, snippet: lines[index].trim().slice(0, 200) };
    } catch {
      // Listed but unreadable (deleted since listing, permissions): not a match
      return null;
    }
  }
}

// ─── repo.read ───────────────────────────────────────────────────────────────

const ReadParams = z.object({
  path: z.string(),
  start_line: z.number().int().positive().optional(),
  end_line: z.number().int().positive().optional(),
});

export class RepoReadTool implements ToolAdapter {
  constructor(private readonly rootDir: string) {}

  async execute(params: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { path, start_line, end_line } = ReadParams.parse(params);
    const lines = readFileSync(resolveInside(this.rootDir, path), "utf-8").split(/\r?\n/);
    const lineStart = Math.min(start_line ?? 1, lines.length);
    const lineEnd = Math.min(end_line ?? lines.length, lineStart + MAX_READ_LINES - 1, lines.length);
    const content = lines.slice(lineStart - 1, lineEnd).join("\n");

    return {
      path,
      content,
      lineStart,
      lineEnd,
      totalLines: lines.length,
      evidencePointer: {
        evidenceType: "code_snippet",
        sourcePath: path,
        snippet: content,
        lineStart,
        lineEnd,
        confidence: 1,
      },
    };
  }
}

// ─── repo.summarize ──────────────────────────────────────────────────────────

const SummarizeParams = z.object({
  path: z.string(),
  max_tokens: z.number().int().positive().default(500),
});

export class RepoSummarizeTool implements ToolAdapter {
  constructor(
    private readonly rootDir: string,
    private readonly files: readonly string[],
  ) {}

  async execute(params: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { path, max_tokens } = SummarizeParams.parse(params);
    const prefix = path === "." || path === "" ? "" : path.replace(/\/+$/, "") + "/";
    const inDir = this.files.filter((f) => f.startsWith(prefix));

    const summary =
      inDir.length === 0 || this.files.includes(path)
        ? this.summarizeFile(path)
        : summarizeDirectory(prefix || "./", inDir.map((f) => f.slice(prefix.length)));

    // Rough budget: four characters per token
    const text = summary.slice(0, max_tokens * 4);
    return {
      path,
      summary: text,
      evidencePointer: {
        evidenceType: evidenceTypeFor(path),
        sourcePath: path,
        section: "summary",
        snippet: text,
        confidence: 0.7,
      },
    };
  }

  private summarizeFile(path: string): string {
    const content = readFileSync(resolveInside(this.rootDir, path), "utf-8");
    const lines = content.split(/\r?\n/);
    const headings = lines.filter((l) => /^#{1,3}\s/.test(l)).slice(0, 10);
    return [
      `## ${path}`,
      "",
      `${lines.length} lines`,
      ...(headings.length > 0 ? ["", "Sections:", ...headings.map((h) => `- ${h.replace(/^#+\s*/, "")}`)] : []),
    ].join("\n");
  }
}

function summarizeDirectory(dir: string, relPaths: string[]): string {
  const children = new Map<string, number>();
  const extensions = new Map<string, number>();
  for (const rel of relPaths) {
    const [head] = rel.split("/");
    const child = rel.includes("/") ? `${head}/` : head;
    children.set(child, (children.get(child) ?? 0) + 1);
    const ext = extname(rel) || "(none)";
    extensions.set(ext, (extensions.get(ext) ?? 0) + 1);
  }
  const topExtensions = [...extensions.entries()]
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .slice(0, 5)
    .map(([ext, n]) => `${ext} (${n})`);

  return [
    `## ${dir}`,
    "",
    `${relPaths.length} files; most common: ${topExtensions.join(", ")}`,
    "",
    ...[...children.entries()]
      .sort((a, b) => a[0].localeCompare(b[0]))
      .slice(0, 30)
      .map(([name, n]) => (name.endsWith("/") ? `- ${name} (${n} files)` : `- ${name}`)),
  ].join("\n");
}

// ─── repo.diff ───────────────────────────────────────────────────────────────

const DiffParams = z.object({
  ref1: z.string(),
  ref2: z.string().default("HEAD"),
});

export class RepoDiffTool implements ToolAdapter {
  constructor(
    private readonly provider: DiffProvider,
    private readonly repo: string,
  ) {}

  async execute(params: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { ref1, ref2 } = DiffParams.parse(params);
    const summary = await collectDiff(this.provider, this.repo, ref1, ref2);
    return {
      ...summary,
      evidencePointer: {
        evidenceType: "commit",
        commitSha: ref2,
        section: `${ref1}..${ref2}`,
        snippet: `${summary.totalFiles} files changed, +${summary.totalAdditions}/-${summary.totalDeletions}`,
        confidence: 1,
      },
    };
  }
}
