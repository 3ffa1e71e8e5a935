// src/privacy-guard.ts — Privacy filter for data flowing to the generative collaborator
// strict: no code at all, only names and summaries
// standard: profile, graph and short snippets (≤20 lines)
// permissive: everything, including full files

import type { EvidencePointer, PrivacyMode, RepoProfile } from "./types.js";

const STANDARD_SNIPPET_LINES = 20;

const REDACTED_KEYS = new Set([
  "code",
  "content",
  "snippet",
  "source_code",
  "sourceCode",
  "raw_content",
  "rawContent",
  "raw_markdown",
  "rawMarkdown",
  "file_content",
  "fileContent",
]);

const MODE_RANK: Record<PrivacyMode, number> = {
  strict: 0,
  standard: 1,
  permissive: 2,
};

export const PRIVACY_MODES: readonly PrivacyMode[] = ["strict", "standard", "permissive"];

export function isPrivacyMode(value: unknown): value is PrivacyMode {
  return PRIVACY_MODES.some((mode) => mode === value);
}

export class PrivacyGuard {
  constructor(readonly mode: PrivacyMode = "standard") {}

  sanitizeProfile(profile: RepoProfile): RepoProfile {
    if (this.mode === "permissive") return profile;
    if (this.mode === "standard") return { ...profile };

    const topDirs = new Set<string>();
    for (const path of profile.fileTree) {
      const slash = path.indexOf("/");
      if (slash > 0) topDirs.add(path.slice(0, slash));
    }
    return {
      ...profile,
      fileTree: [...topDirs].sort().map((d) => `${d}/`),
    };
  }

  sanitizeEvidence(pointer: EvidencePointer): EvidencePointer {
    if (this.mode === "permissive") return pointer;

    let snippet = pointer.snippet;
    if (this.mode === "strict") {
      snippet = snippet ? "[code redacted]" : "";
    } else {
      const lines = snippet.split(/\r?\n/);
      if (lines.length > STANDARD_SNIPPET_LINES) {
        snippet = lines.slice(0, STANDARD_SNIPPET_LINES).join("\n") + "\n[truncated]";
      }
    }
    return Object.freeze({ ...pointer, snippet });
  }

  /**
   * Strict mode replaces the value of every code-bearing key, at any depth,
   * with "[redacted]". Other modes pass the payload through.
   */
  sanitizeContext(payload: Record<string, unknown>): Record<string, unknown> {
    if (this.mode !== "strict") return payload;
    return redactRecord(payload);
  }

  allowsCode(): boolean {
    return this.mode !== "strict";
  }

  allowsFullFiles(): boolean {
    return this.mode === "permissive";
  }

  /**
   * Whether data requiring `required` may flow under the active mode.
   */
  permits(required: PrivacyMode): boolean {
    return MODE_RANK[this.mode] >= MODE_RANK[required];
  }
}

function redactRecord(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    out[key] = REDACTED_KEYS.has(key) ? "[redacted]" : redactValue(value);
  }
  return out;
}

function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redactValue);
  if (isRecord(value)) return redactRecord(value);
  return value;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
