// src/diff/release-notes.ts — Release notes from a diff and its impact report
// Rendered as Keep-a-Changelog Markdown.

import type {
  DiffSummary,
  FileDiff,
  ImpactReport,
  ReleaseNote,
  ReleaseNoteCategory,
  ReleaseNotes,
} from "../types.js";

const CATEGORY_ORDER: readonly ReleaseNoteCategory[] = ["added", "changed", "fixed", "removed", "security"];

export interface ReleaseNotesOptions {
  version?: string;
  /** ISO date; defaults to today. */
  date?: string;
}

export function buildReleaseNotes(
  diff: DiffSummary,
  impact?: ImpactReport,
  options: ReleaseNotesOptions = {},
): ReleaseNotes {
  // Deleting a file that documented entities hang off is a breaking change
  const removedWithEntities = new Set(
    (impact?.entityDeltas ?? [])
      .filter((d) => d.kind === "remove")
      .flatMap((d) => d.affectedFiles),
  );

  const notes = diff.fileDiffs.map((fd) => noteFor(fd, removedWithEntities.has(fd.path)));

  const summary: string[] = [];
  if (diff.totalFiles > 0) summary.push(`${diff.totalFiles} files changed`);
  if (impact && impact.totalDeltas > 0) summary.push(`${impact.totalDeltas} knowledge-graph deltas`);

  return {
    version: options.version || "unreleased",
    date: options.date ?? new Date().toISOString().slice(0, 10),
    summary: summary.length > 0 ? summary.join(", ") : "No changes",
    notes,
  };
}

function noteFor(fd: FileDiff, breaking: boolean): ReleaseNote {
  switch (fd.status) {
    case "added":
      return { category: "added", title: `New file: ${fd.path}`, description: `Added ${fd.additions} lines`, files: [fd.path], breaking };
    case "deleted":
      return { category: "removed", title: `Removed: ${fd.path}`, description: `Deleted ${fd.deletions} lines`, files: [fd.path], breaking };
    case "renamed":
      return {
        category: "changed",
        title: `Renamed: ${fd.oldPath ?? "?"} → ${fd.path}`,
        description: `+${fd.additions}/-${fd.deletions} lines`,
        files: fd.oldPath ? [fd.oldPath, fd.path] : [fd.path],
        breaking,
      };
    case "modified":
      return { category: "changed", title: `Updated: ${fd.path}`, description: `+${fd.additions}/-${fd.deletions} lines`, files: [fd.path], breaking };
  }
}

export function renderReleaseNotes(notes: ReleaseNotes): string {
  const lines = [`## [${notes.version}] - ${notes.date}`, ""];
  if (notes.summary) lines.push(notes.summary, "");

  for (const category of CATEGORY_ORDER) {
    const entries = notes.notes.filter((n) => n.category === category);
    if (entries.length === 0) continue;
    lines.push(`### ${category.charAt(0).toUpperCase()}${category.slice(1)}`);
    for (const n of entries) {
      lines.push(`- ${n.breaking ? "**BREAKING** " : ""}${n.title}: ${n.description}`);
    }
    lines.push("");
  }
  return lines.join("\n");
}
