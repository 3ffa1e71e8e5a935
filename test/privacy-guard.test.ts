import { describe, it, expect } from "vitest";
import { PrivacyGuard } from "../src/privacy-guard.js";
import { createEvidencePointer } from "../src/evidence-registry.js";
import { makeProfile } from "./helpers.js";

const profile = makeProfile({ fileTree: ["README.md", "src/app.ts", "src/db.ts", "infra/main.tf"] });

describe("PrivacyGuard.sanitizeProfile", () => {
  it("collapses the file tree to top-level directories in strict mode", () => {
    const safe = new PrivacyGuard("strict").sanitizeProfile(profile);
    expect(safe.fileTree).toEqual(["infra/", "src/"]);
    expect(profile.fileTree).toHaveLength(4);
  });

  it("copies the profile in standard mode and passes it through in permissive mode", () => {
    const standard = new PrivacyGuard("standard").sanitizeProfile(profile);
    expect(standard).not.toBe(profile);
    expect(standard).toEqual(profile);
    expect(new PrivacyGuard("permissive").sanitizeProfile(profile)).toBe(profile);
  });
});

describe("PrivacyGuard.sanitizeEvidence", () => {
  it("redacts snippets in strict mode", () => {
    const pointer = createEvidencePointer({ evidenceType: "code_snippet", snippet: "const x = 1;" });
    expect(new PrivacyGuard("strict").sanitizeEvidence(pointer).snippet).toBe("[code redacted]");
    const empty = createEvidencePointer({ evidenceType: "commit" });
    expect(new PrivacyGuard("strict").sanitizeEvidence(empty).snippet).toBe("");
  });

  it("truncates long snippets to 20 lines in standard mode", () => {
    const lines = Array.from({ length: 25 }, (_, i) => `l${i}`);
    const pointer = { ...createEvidencePointer({ evidenceType: "code_file" }), snippet: lines.join("\n") };
    const safe = new PrivacyGuard("standard").sanitizeEvidence(pointer);
    expect(safe.snippet).toBe(lines.slice(0, 20).join("\n") + "\n[truncated]");
    expect(pointer.snippet.split("\n")).toHaveLength(25);
  });
});

describe("PrivacyGuard.sanitizeContext", () => {
  it("redacts code-bearing keys at any depth in strict mode", () => {
    const payload = { name: "svc", code: "x()", nested: { items: [{ fileContent: "secret", id: 1 }] } };
    expect(new PrivacyGuard("strict").sanitizeContext(payload)).toEqual({
      name: "svc",
      code: "[redacted]",
      nested: { items: [{ fileContent: "[redacted]", id: 1 }] },
    });
    expect(payload.code).toBe("x()");
  });

  it("passes context through outside strict mode", () => {
    const payload = { code: "x()" };
    expect(new PrivacyGuard("standard").sanitizeContext(payload)).toBe(payload);
  });
});

describe("PrivacyGuard capabilities", () => {
  it("orders modes strict < standard < permissive", () => {
    const standard = new PrivacyGuard("standard");
    expect(standard.permits("strict")).toBe(true);
    expect(standard.permits("standard")).toBe(true);
    expect(standard.permits("permissive")).toBe(false);
    expect(new PrivacyGuard("strict").allowsCode()).toBe(false);
    expect(standard.allowsCode()).toBe(true);
    expect(standard.allowsFullFiles()).toBe(false);
    expect(new PrivacyGuard("permissive").allowsFullFiles()).toBe(true);
  });
});
