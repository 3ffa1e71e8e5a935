// src/diff/diff-collector.ts — File-level diff between two refs
// The DiffProvider is the collaborator that talks to version control;
// collectDiff only shapes what it returns.

import { execFileSync } from "node:child_process";
import type { DiffSummary, FileDiff, FileStatus } from "../types.js";

export interface DiffProvider {
  fetchDiff(repo: string, baseRef: string, headRef: string): Promise<FileDiff[]>;
}

export async function collectDiff(
  provider: DiffProvider,
  repo: string,
  baseRef: string,
  headRef: string,
): Promise<DiffSummary> {
  const raw = await provider.fetchDiff(repo, baseRef, headRef);
  const fileDiffs = raw
    .filter((fd) => fd.path.length > 0)
    .map((fd) => ({
      ...fd,
      additions: Math.max(0, fd.additions),
      deletions: Math.max(0, fd.deletions),
    }));

  return {
    baseRef,
    headRef,
    totalFiles: fileDiffs.length,
    totalAdditions: fileDiffs.reduce((sum, fd) => sum + fd.additions, 0),
    totalDeletions: fileDiffs.reduce((sum, fd) => sum + fd.deletions, 0),
    fileDiffs,
  };
}

export function changedPaths(summary: DiffSummary): string[] {
  return summary.fileDiffs.map((fd) => fd.path);
}

// ─── Local git ───────────────────────────────────────────────────────────────

const STATUS_BY_LETTER: Record<string, FileStatus> = {
  A: "added",
  C: "added",
  M: "modified",
  T: "modified",
  D: "deleted",
  R: "renamed",
};

/**
 * Reads diffs from a local clone with `git diff -M`. `repo` is the working
 * directory of the clone.
 */
export class GitDiffProvider implements DiffProvider {
  async fetchDiff(repo: string, baseRef: string, headRef: string): Promise<FileDiff[]> {
    const nameStatus = runGit(repo, ["diff", "--name-status", "-M", "-z", baseRef, headRef]);
    const numstat = runGit(repo, ["diff", "--numstat", "-M", "-z", baseRef, headRef]);
    return mergeGitDiff(parseNameStatus(nameStatus), parseNumstat(numstat));
  }
}

function runGit(cwd: string, args: string[]): string {
  try {
    return execFileSync("git", args, {
      cwd,
      encoding: "utf-8",
      timeout: 30_000,
      maxBuffer: 32 * 1024 * 1024,
      stdio: ["pipe", "pipe", "pipe"],
    });
  } catch (err) {
    throw new Error(`git ${args[0]} failed: ${err instanceof Error ? err.message : String(err)}`);
  }
}

interface NameStatusEntry {
  status: FileStatus;
  path: string;
  oldPath?: string;
}

/**
 * Parse `git diff --name-status -z`: a status token followed by one path,
 * or two (old, new) for renames and copies.
 */
export function parseNameStatus(output: string): NameStatusEntry[] {
  const tokens = output.split("\0");
  const entries: NameStatusEntry[] = [];
  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i];
    if (!token) {
      i++;
      continue;
    }
    const letter = token.charAt(0);
    const status = STATUS_BY_LETTER[letter] ?? "modified";
    if (letter === "R" || letter === "C") {
      const oldPath = tokens[i + 1] ?? "";
      const path = tokens[i + 2] ?? "";
      entries.push(letter === "R" ? { status, path, oldPath } : { status, path });
      i += 3;
    } else {
      entries.push({ status, path: tokens[i + 1] ?? "" });
      i += 2;
    }
  }
  return entries;
}

/**
 * Parse `git diff --numstat -z`. Binary files report "-" and count as 0.
 * Renames carry an empty path field followed by the old and new paths.
 */
export function parseNumstat(output: string): Map<string, { additions: number; deletions: number }> {
  const counts = new Map<string, { additions: number; deletions: number }>();
  const tokens = output.split("\0");
  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i];
    const parts = token.split("\t");
    if (parts.length < 3) {
      i++;
      continue;
    }
    const additions = parts[0] === "-" ? 0 : Number.parseInt(parts[0], 10) || 0;
    const deletions = parts[1] === "-" ? 0 : Number.parseInt(parts[1], 10) || 0;
    if (parts[2] === "") {
      counts.set(tokens[i + 2] ?? "", { additions, deletions });
      i += 3;
    } else {
      counts.set(parts[2], { additions, deletions });
      i += 1;
    }
  }
  return counts;
}

function mergeGitDiff(
  entries: NameStatusEntry[],
  counts: Map<string, { additions: number; deletions: number }>,
): FileDiff[] {
  return entries.map((e) => {
    const c = counts.get(e.path) ?? { additions: 0, deletions: 0 };
    const diff: FileDiff = { path: e.path, status: e.status, additions: c.additions, deletions: c.deletions };
    if (e.oldPath !== undefined) diff.oldPath = e.oldPath;
    return diff;
  });
}
