// src/evidence-registry.ts — Evidence pointers, claims and coverage scoring
// One registry per orchestration run. Registered records are frozen copies.

import { randomUUID } from "node:crypto";
import type {
  Claim,
  EvidenceCoverage,
  EvidencePointer,
  EvidenceType,
} from "./types.js";
import {
  MAX_SNIPPET_CHARS,
  TRUSTWORTHY_COVERAGE_PCT,
  TRUSTWORTHY_MIN_CONFIDENCE,
} from "./types.js";

// ─── Factories ───────────────────────────────────────────────────────────────

export interface EvidencePointerInput {
  id?: string;
  evidenceType: EvidenceType;
  sourcePath?: string;
  section?: string;
  snippet?: string;
  lineStart?: number;
  lineEnd?: number;
  commitSha?: string;
  url?: string;
  confidence?: number;
  metadata?: Record<string, unknown>;
}

export function createEvidencePointer(input: EvidencePointerInput): EvidencePointer {
  return Object.freeze({
    id: input.id ?? `ev-${shortId(10)}`,
    evidenceType: input.evidenceType,
    sourcePath: input.sourcePath ?? "",
    section: input.section ?? "",
    snippet: (input.snippet ?? "").slice(0, MAX_SNIPPET_CHARS),
    lineStart: input.lineStart,
    lineEnd: input.lineEnd,
    commitSha: input.commitSha ?? "",
    url: input.url ?? "",
    confidence: clamp01(input.confidence ?? 1),
    metadata: Object.freeze({ ...(input.metadata ?? {}) }),
  });
}

export interface ClaimInput {
  id?: string;
  text: string;
  artifactId?: string;
  evidenceIds?: readonly string[];
  confidence?: number;
}

/**
 * A claim is an assumption exactly when it cites no evidence.
 */
export function createClaim(input: ClaimInput): Claim {
  const evidenceIds = Object.freeze([...(input.evidenceIds ?? [])]);
  return Object.freeze({
    id: input.id ?? `cl-${shortId(8)}`,
    text: input.text,
    artifactId: input.artifactId ?? "",
    evidenceIds,
    isAssumption: evidenceIds.length === 0,
    confidence: clamp01(input.confidence ?? 1),
  });
}

// ─── Registry ────────────────────────────────────────────────────────────────

export class EvidenceRegistry {
  private readonly pointers = new Map<string, EvidencePointer>();
  private claims: Claim[] = [];

  /**
   * Register a pointer. Idempotent by id: the first registration wins.
   */
  registerPointer(pointer: EvidencePointer): string {
    if (!this.pointers.has(pointer.id)) {
      this.pointers.set(pointer.id, createEvidencePointer(pointer));
    }
    return pointer.id;
  }

  /**
   * Register a claim. The assumption flag is recomputed from the evidence
   * list at this moment and never changes afterwards.
   */
  registerClaim(claim: Claim): Claim {
    const frozen = createClaim(claim);
    this.claims.push(frozen);
    return frozen;
  }

  /**
   * Drop every claim registered for an artifact, before the artifact is
   * produced again. Pointers stay, since other claims may cite them.
   */
  resetArtifact(artifactId: string): number {
    const before = this.claims.length;
    this.claims = this.claims.filter((c) => c.artifactId !== artifactId);
    return before - this.claims.length;
  }

  getPointer(id: string): EvidencePointer | undefined {
    return this.pointers.get(id);
  }

  claimsForArtifact(artifactId: string): Claim[] {
    return this.claims.filter((c) => c.artifactId === artifactId);
  }

  allPointers(): EvidencePointer[] {
    return [...this.pointers.values()];
  }

  allClaims(): Claim[] {
    return [...this.claims];
  }

  computeCoverage(artifactId: string, artifactType = ""): EvidenceCoverage {
    return buildCoverage(artifactId, artifactType, this.claimsForArtifact(artifactId));
  }

  /**
   * Coverage for every artifact that has at least one claim, sorted by id.
   */
  computeAllCoverage(): EvidenceCoverage[] {
    const ids = [...new Set(this.claims.map((c) => c.artifactId))].sort();
    return ids.map((id) => this.computeCoverage(id));
  }
}

function buildCoverage(
  artifactId: string,
  artifactType: string,
  claims: Claim[],
): EvidenceCoverage {
  const backed = claims.filter((c) => !c.isAssumption);
  const assumptions = claims.filter((c) => c.isAssumption);
  const evidenceIds = new Set<string>();
  for (const c of backed) {
    for (const id of c.evidenceIds) evidenceIds.add(id);
  }
  const confidences = claims.map((c) => c.confidence);
  const confidenceMean =
    confidences.length > 0
      ? confidences.reduce((sum, c) => sum + c, 0) / confidences.length
      : 0;
  const confidenceMin = confidences.length > 0 ? Math.min(...confidences) : 0;
  const coveragePct = claims.length > 0 ? (backed.length / claims.length) * 100 : 100;

  return Object.freeze({
    artifactId,
    artifactType,
    totalClaims: claims.length,
    backedClaims: backed.length,
    assumptionCount: assumptions.length,
    assumptions: assumptions.map((a) => a.text),
    evidenceIds: [...evidenceIds].sort(),
    confidenceMean,
    confidenceMin,
    coveragePct,
    isTrustworthy:
      coveragePct >= TRUSTWORTHY_COVERAGE_PCT &&
      confidenceMin >= TRUSTWORTHY_MIN_CONFIDENCE,
  });
}

/**
 * Display form used in CLI output and logs.
 */
export function coverageSummary(coverage: EvidenceCoverage): Record<string, string | number | boolean> {
  return {
    artifact: coverage.artifactId,
    type: coverage.artifactType,
    coverage: `${coverage.coveragePct.toFixed(1)}%`,
    totalClaims: coverage.totalClaims,
    backedClaims: coverage.backedClaims,
    assumptions: coverage.assumptionCount,
    confidenceMean: round2(coverage.confidenceMean),
    confidenceMin: round2(coverage.confidenceMin),
    trustworthy: coverage.isTrustworthy,
  };
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function shortId(length: number): string {
  return randomUUID().replace(/-/g, "").slice(0, length);
}

function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
