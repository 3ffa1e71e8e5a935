// src/file-discovery.ts — Repository file listing
// git ls-files when available (respects .gitignore), filesystem walk otherwise.
// Paths are returned relative to the root, with forward slashes, sorted.

import { readdirSync, realpathSync, statSync } from "node:fs";
import { join, relative, resolve, sep } from "node:path";
import { execSync } from "node:child_process";
import picomatch from "picomatch";
import type { Warning } from "./types.js";
import { DEFAULT_EXCLUDE_DIRS } from "./types.js";

const MAX_FILES = 20_000;
const EXCLUDED_DIRS: ReadonlySet<string> = new Set(DEFAULT_EXCLUDE_DIRS);

export function listRepoFiles(
  rootDir: string,
  excludePatterns: string[] = [],
  warnings: Warning[] = [],
): string[] {
  const absRoot = resolve(rootDir);
  const files = tryGitLsFiles(absRoot) ?? walk(absRoot, warnings);
  const isExcluded =
    excludePatterns.length > 0 ? picomatch(excludePatterns, { dot: true }) : null;

  const kept = files
    .filter((f) => !f.split("/").some((part) => isExcludedDir(part)))
    .filter((f) => !isExcluded?.(f))
    .sort();
  if (kept.length > MAX_FILES) {
    warnings.push({
      level: "warn",
      module: "file-discovery",
      message: `Repository has ${kept.length} files; only the first ${MAX_FILES} are listed`,
    });
    return kept.slice(0, MAX_FILES);
  }
  return kept;
}

/**
 * Returns null if git is unavailable or rootDir is not inside a work tree.
 */
function tryGitLsFiles(rootDir: string): string[] | null {
  try {
    const output = execSync("git ls-files --cached --others --exclude-standard", {
      cwd: rootDir,
      encoding: "utf-8",
      timeout: 5000,
      stdio: ["pipe", "pipe", "pipe"],
    });
    return output
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  } catch {
    // Not a git work tree; caller walks the filesystem instead
    return null;
  }
}

function walk(rootDir: string, warnings: Warning[]): string[] {
  const results: string[] = [];
  const visited = new Set<number>();
  const stack = [rootDir];

  while (stack.length > 0) {
    const dir = stack.pop();
    if (dir === undefined) break;
    let entries;
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (err: unknown) {
      warnings.push({
        level: "warn",
        module: "file-discovery",
        message: `Cannot read directory: ${err instanceof Error ? err.message : String(err)}`,
        file: dir,
      });
      continue;
    }

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!isExcludedDir(entry.name)) stack.push(fullPath);
      } else if (entry.isFile()) {
        results.push(toPosix(relative(rootDir, fullPath)));
      } else if (entry.isSymbolicLink()) {
        followSymlink(rootDir, fullPath, visited, stack, results, warnings);
      }
    }
  }
  return results;
}

/**
 * Symlinks are followed only inside the root; directory cycles are cut by inode.
 */
function followSymlink(
  rootDir: string,
  fullPath: string,
  visited: Set<number>,
  stack: string[],
  results: string[],
  warnings: Warning[],
): void {
  try {
    const realPath = realpathSync(fullPath);
    if (!realPath.startsWith(rootDir)) {
      warnings.push({
        level: "info",
        module: "file-discovery",
        message: `Symlink ${relative(rootDir, fullPath)} points outside the repository and was skipped`,
        file: fullPath,
      });
      return;
    }
    const stat = statSync(realPath);
    if (stat.isDirectory()) {
      if (visited.has(stat.ino)) return;
      visited.add(stat.ino);
      stack.push(fullPath);
    } else if (stat.isFile()) {
      results.push(toPosix(relative(rootDir, fullPath)));
    }
  } catch (err: unknown) {
    warnings.push({
      level: "warn",
      module: "file-discovery",
      message: `Cannot resolve symlink: ${err instanceof Error ? err.message : String(err)}`,
      file: fullPath,
    });
  }
}

function isExcludedDir(name: string): boolean {
  return EXCLUDED_DIRS.has(name);
}

function toPosix(path: string): string {
  return sep === "/" ? path : path.split(sep).join("/");
}
