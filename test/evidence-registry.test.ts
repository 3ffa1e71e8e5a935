import { describe, it, expect } from "vitest";
import {
  EvidenceRegistry,
  coverageSummary,
  createClaim,
  createEvidencePointer,
} from "../src/evidence-registry.js";

describe("createEvidencePointer", () => {
  it("truncates snippets and clamps confidence", () => {
    const pointer = createEvidencePointer({
      evidenceType: "code_file",
      sourcePath: "src/app.ts",
      snippet: "x".repeat(250),
      confidence: 1.7,
    });
    expect(pointer.id).toMatch(/^ev-[0-9a-f]{10}$/);
    expect(pointer.snippet).toHaveLength(200);
    expect(pointer.confidence).toBe(1);
    expect(Object.isFrozen(pointer)).toBe(true);
  });
});

describe("createClaim", () => {
  it("is an assumption exactly when it cites no evidence", () => {
    expect(createClaim({ text: "uses postgres" }).isAssumption).toBe(true);
    expect(createClaim({ text: "uses postgres", evidenceIds: ["ev-1"] }).isAssumption).toBe(false);
  });
});

describe("EvidenceRegistry", () => {
  it("keeps the first pointer registered under an id", () => {
    const registry = new EvidenceRegistry();
    registry.registerPointer(createEvidencePointer({ id: "ev-1", evidenceType: "commit", snippet: "first" }));
    const id = registry.registerPointer(createEvidencePointer({ id: "ev-1", evidenceType: "commit", snippet: "second" }));
    expect(id).toBe("ev-1");
    expect(registry.getPointer("ev-1")?.snippet).toBe("first");
    expect(registry.allPointers()).toHaveLength(1);
  });

  it("computes per-artifact coverage", () => {
    const registry = new EvidenceRegistry();
    registry.registerClaim(createClaim({ text: "a", artifactId: "doc", evidenceIds: ["ev-2", "ev-1"], confidence: 0.9 }));
    registry.registerClaim(createClaim({ text: "b", artifactId: "doc", evidenceIds: ["ev-1"], confidence: 0.8 }));
    registry.registerClaim(createClaim({ text: "c", artifactId: "doc", evidenceIds: ["ev-3"], confidence: 0.7 }));
    registry.registerClaim(createClaim({ text: "guess", artifactId: "doc", confidence: 0.2 }));

    const coverage = registry.computeCoverage("doc", "markdown");
    expect(coverage.totalClaims).toBe(4);
    expect(coverage.backedClaims).toBe(3);
    expect(coverage.assumptionCount).toBe(1);
    expect(coverage.assumptions).toEqual(["guess"]);
    expect(coverage.evidenceIds).toEqual(["ev-1", "ev-2", "ev-3"]);
    expect(coverage.coveragePct).toBe(75);
    expect(coverage.confidenceMin).toBe(0.2);
    expect(coverage.isTrustworthy).toBe(false);

    expect(coverageSummary(coverage)).toEqual({
      artifact: "doc",
      type: "markdown",
      coverage: "75.0%",
      totalClaims: 4,
      backedClaims: 3,
      assumptions: 1,
      confidenceMean: 0.65,
      confidenceMin: 0.2,
      trustworthy: false,
    });
  });

  it("reports full coverage for an artifact without claims", () => {
    const coverage = new EvidenceRegistry().computeCoverage("empty");
    expect(coverage.coveragePct).toBe(100);
    expect(coverage.totalClaims).toBe(0);
    expect(coverage.isTrustworthy).toBe(false);
  });

  it("lists coverage for every artifact, sorted by id", () => {
    const registry = new EvidenceRegistry();
    registry.registerClaim(createClaim({ text: "x", artifactId: "zeta" }));
    registry.registerClaim(createClaim({ text: "y", artifactId: "alpha", evidenceIds: ["ev-1"] }));
    expect(registry.computeAllCoverage().map((c) => c.artifactId)).toEqual(["alpha", "zeta"]);
  });

  it("is not trustworthy at full coverage when a claim is below the confidence floor", () => {
    const registry = new EvidenceRegistry();
    registry.registerClaim(createClaim({ text: "weak", artifactId: "weak", evidenceIds: ["ev-1"], confidence: 0.29 }));
    registry.registerClaim(createClaim({ text: "firm", artifactId: "firm", evidenceIds: ["ev-1"], confidence: 0.3 }));

    const weak = registry.computeCoverage("weak");
    expect(weak.coveragePct).toBe(100);
    expect(weak.confidenceMin).toBe(0.29);
    expect(weak.isTrustworthy).toBe(false);
    expect(registry.computeCoverage("firm").isTrustworthy).toBe(true);
  });

  it("never lowers coverage for a backed claim or raises it for an assumption", () => {
    const registry = new EvidenceRegistry();
    registry.registerClaim(createClaim({ text: "fact", artifactId: "doc", evidenceIds: ["ev-1"] }));
    registry.registerClaim(createClaim({ text: "guess", artifactId: "doc" }));
    const start = registry.computeCoverage("doc").coveragePct;

    registry.registerClaim(createClaim({ text: "fact 2", artifactId: "doc", evidenceIds: ["ev-2"] }));
    const afterBacked = registry.computeCoverage("doc").coveragePct;
    expect(afterBacked).toBeGreaterThanOrEqual(start);

    registry.registerClaim(createClaim({ text: "guess 2", artifactId: "doc" }));
    expect(registry.computeCoverage("doc").coveragePct).toBeLessThanOrEqual(afterBacked);
  });

  it("replaces an artifact's claims on reset and keeps its pointers", () => {
    const registry = new EvidenceRegistry();
    registry.registerPointer(createEvidencePointer({ id: "ev-1", evidenceType: "config_file" }));
    registry.registerClaim(createClaim({ text: "guess", artifactId: "section" }));
    registry.registerClaim(createClaim({ text: "fact", artifactId: "section", evidenceIds: ["ev-1"] }));
    registry.registerClaim(createClaim({ text: "other", artifactId: "step-1" }));

    expect(registry.resetArtifact("section")).toBe(2);
    expect(registry.claimsForArtifact("section")).toEqual([]);
    expect(registry.claimsForArtifact("step-1")).toHaveLength(1);
    expect(registry.getPointer("ev-1")).toBeDefined();
    expect(registry.resetArtifact("missing")).toBe(0);
  });

  it("freezes registered claims", () => {
    const registry = new EvidenceRegistry();
    const claim = registry.registerClaim(createClaim({ text: "x", evidenceIds: ["ev-1"] }));
    expect(Object.isFrozen(claim)).toBe(true);
    expect(Object.isFrozen(claim.evidenceIds)).toBe(true);
  });
});
