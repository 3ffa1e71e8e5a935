// src/repo-profile.ts — Repository profile and signal detection
// Signals are architectural hints (docker-compose, kafka, terraform, ...)
// detected from file paths, or from README mentions at lower confidence.

import { existsSync, readFileSync } from "node:fs";
import { basename, extname, join, resolve } from "node:path";
import picomatch from "picomatch";
import type { RepoProfile, RepoSignal, Warning } from "./types.js";
import { listRepoFiles } from "./file-discovery.js";

// ─── Signal table ────────────────────────────────────────────────────────────

interface SignalPattern {
  signalType: string;
  paths: string[];
  mentions?: RegExp;
}

const SIGNAL_PATTERNS: readonly SignalPattern[] = [
  { signalType: "docker-compose", paths: ["**/docker-compose.{yml,yaml}", "**/compose.{yml,yaml}"], mentions: /docker[- ]compose/i },
  { signalType: "Dockerfile", paths: ["**/Dockerfile", "**/*.Dockerfile"] },
  { signalType: "kubernetes", paths: ["**/k8s/**", "**/kube/**", "**/kubernetes/**", "**/deployment.{yaml,yml}"], mentions: /\bkubernetes\b/i },
  { signalType: "helm", paths: ["**/Chart.yaml", "**/charts/**"], mentions: /\bhelm\b/i },
  { signalType: "terraform", paths: ["**/*.tf"], mentions: /\bterraform\b/i },
  { signalType: "pulumi", paths: ["**/Pulumi.yaml", "**/Pulumi.*.yaml"], mentions: /\bpulumi\b/i },
  { signalType: "cloudformation", paths: ["**/cloudformation/**", "**/*.template.{json,yaml,yml}"], mentions: /\bcloudformation\b/i },
  { signalType: "kafka", paths: ["**/kafka/**", "**/kafka*.{yml,yaml,properties,conf}"], mentions: /\bkafka\b/i },
  { signalType: "rabbitmq", paths: ["**/rabbitmq/**", "**/rabbitmq*.{conf,yml,yaml}"], mentions: /\brabbitmq\b/i },
  { signalType: "sqs", paths: ["**/sqs/**", "**/sqs*.{yml,yaml,json,tf}"], mentions: /\b(?:amazon |aws )?sqs\b/i },
  { signalType: "eventbridge", paths: ["**/eventbridge/**", "**/eventbridge*.{yml,yaml,json,tf}"], mentions: /\beventbridge\b/i },
  { signalType: "nats", paths: ["**/nats*/**", "**/nats.conf"], mentions: /\bnats\b/i },
  { signalType: "ml-training", paths: ["**/train.py", "**/training/**"] },
  { signalType: "pytorch", paths: [], mentions: /\b(?:pytorch|torch)\b/i },
  { signalType: "tensorflow", paths: [], mentions: /\btensorflow\b/i },
  { signalType: "huggingface", paths: [], mentions: /\b(?:hugging ?face|transformers)\b/i },
  { signalType: "vector-db", paths: [], mentions: /\b(?:pinecone|weaviate|qdrant|chroma|milvus|pgvector)\b/i },
  { signalType: "rag", paths: ["**/rag/**"], mentions: /\b(?:rag|retrieval[- ]augmented)\b/i },
  { signalType: "airflow", paths: ["**/dags/**/*.py", "**/airflow.cfg"], mentions: /\bairflow\b/i },
  { signalType: "dbt", paths: ["**/dbt_project.yml"], mentions: /\bdbt\b/i },
  { signalType: "spark", paths: ["**/spark/**", "**/spark-defaults.conf", "**/spark*.{yml,yaml}"], mentions: /\b(?:spark|pyspark)\b/i },
  { signalType: "warehouse", paths: [], mentions: /\b(?:snowflake|bigquery|redshift|data warehouse)\b/i },
];

const PATH_CONFIDENCE = 0.9;
const MENTION_CONFIDENCE = 0.6;

/**
 * One signal per type: the first matching file path wins; a README mention
 * is used only when no path matches.
 */
export function detectSignals(fileTree: readonly string[], readme = ""): RepoSignal[] {
  const signals: RepoSignal[] = [];
  for (const pattern of SIGNAL_PATTERNS) {
    const isMatch = pattern.paths.length > 0 ? picomatch(pattern.paths, { dot: true, nocase: true }) : null;
    const filePath = isMatch ? fileTree.find((p) => isMatch(p)) : undefined;
    if (filePath !== undefined) {
      signals.push({ signalType: pattern.signalType, filePath, confidence: PATH_CONFIDENCE, details: {} });
    } else if (pattern.mentions?.test(readme)) {
      signals.push({
        signalType: pattern.signalType,
        confidence: MENTION_CONFIDENCE,
        details: { source: "readme_mention" },
      });
    }
  }
  return signals;
}

export function hasSignal(profile: RepoProfile, signalType: string): boolean {
  return profile.signals.some((s) => s.signalType === signalType);
}

// ─── Profile builder ─────────────────────────────────────────────────────────

const LANGUAGE_BY_EXTENSION: Record<string, string> = {
  ".ts": "TypeScript",
  ".tsx": "TypeScript",
  ".js": "JavaScript",
  ".jsx": "JavaScript",
  ".mjs": "JavaScript",
  ".py": "Python",
  ".go": "Go",
  ".rs": "Rust",
  ".java": "Java",
  ".kt": "Kotlin",
  ".rb": "Ruby",
  ".cs": "C#",
  ".cpp": "C++",
  ".c": "C",
  ".php": "PHP",
  ".scala": "Scala",
  ".swift": "Swift",
  ".tf": "HCL",
  ".sql": "SQL",
};

export type RepoProfileOverrides = Partial<Omit<RepoProfile, "fileTree" | "signals">>;

/**
 * Build a profile from a local checkout. Missing README or LICENSE leave the
 * corresponding fields empty.
 */
export function buildRepoProfile(
  rootDir: string,
  overrides: RepoProfileOverrides = {},
  warnings: Warning[] = [],
  exclude: string[] = [],
): RepoProfile {
  const absRoot = resolve(rootDir);
  const fileTree = listRepoFiles(absRoot, exclude, warnings);
  const readme = readFirst(absRoot, fileTree, /^readme(\.md|\.rst|\.txt)?$/i);
  const license = readFirst(absRoot, fileTree, /^(license|licence|copying)(\.md|\.txt)?$/i);
  const languages = rankLanguages(fileTree);

  return {
    repoName: overrides.repoName ?? basename(absRoot),
    repoUrl: overrides.repoUrl ?? "",
    description: overrides.description ?? "",
    primaryLanguage: overrides.primaryLanguage ?? languages[0] ?? "",
    languages: overrides.languages ?? languages,
    fileTree,
    signals: detectSignals(fileTree, readme),
    readmeSummary: overrides.readmeSummary ?? firstParagraph(readme),
    license: overrides.license ?? licenseName(license),
    topics: overrides.topics ?? [],
  };
}

/**
 * Languages ordered by file count, ties alphabetical.
 */
export function rankLanguages(fileTree: readonly string[]): string[] {
  const counts = new Map<string, number>();
  for (const path of fileTree) {
    const lang = LANGUAGE_BY_EXTENSION[extname(path).toLowerCase()];
    if (lang) counts.set(lang, (counts.get(lang) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .map(([lang]) => lang);
}

/**
 * First paragraph of a Markdown README that is not a heading or badge line.
 */
export function firstParagraph(markdown: string): string {
  const paragraphs = markdown.split(/\r?\n\s*\r?\n/);
  for (const para of paragraphs) {
    const text = para
      .split(/\r?\n/)
      .filter((line) => !/^\s*(#|!\[|\[!\[|<)/.test(line))
      .join(" ")
      .trim();
    if (text) return text;
  }
  return "";
}

function readFirst(rootDir: string, fileTree: readonly string[], name: RegExp): string {
  const match = fileTree.find((p) => !p.includes("/") && name.test(p));
  if (!match) return "";
  const abs = join(rootDir, match);
  return existsSync(abs) ? readFileSync(abs, "utf-8") : "";
}

function licenseName(text: string): string {
  if (!text) return "";
  if (/MIT License/i.test(text)) return "MIT";
  if (/Apache License/i.test(text)) return "Apache-2.0";
  if (/GNU GENERAL PUBLIC LICENSE/i.test(text)) return "GPL";
  if (/BSD/i.test(text)) return "BSD";
  return "Other";
}
