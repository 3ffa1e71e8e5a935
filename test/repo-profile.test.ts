import { describe, it, expect, afterAll } from "vitest";
import { rmSync } from "node:fs";
import { basename } from "node:path";
import { buildRepoProfile, detectSignals, firstParagraph, hasSignal, rankLanguages } from "../src/repo-profile.js";
import { makeProfile, signal, tempRepo } from "./helpers.js";

const README = "# Shop\n\n![badge](x)\n\nOrders and payments service backed by Kafka.\n\nMore.";

const root = tempRepo({
  "README.md": README,
  LICENSE: "MIT License\n\nCopyright (c) Shop contributors",
  "docker-compose.yml": "services:\n  api:\n    image: shop/api\n",
  "infra/main.tf": 'resource "aws_s3_bucket" "assets" {}\n',
  "src/app.ts": 'import x;\nexport const topic = "orders";\nexport default topic;',
  "src/util.ts": "export {};\n",
});

afterAll(() => {
  rmSync(root, { recursive: true, force: true });
});

describe("detectSignals", () => {
  it("prefers a matching path over a README mention", () => {
    const signals = detectSignals(["deploy/kafka/topics.yml"], "We run Kafka.");
    expect(signals).toEqual([signal("kafka", "deploy/kafka/topics.yml")]);
  });

  it("falls back to README mentions at lower confidence", () => {
    expect(detectSignals([], "Ships events through Kafka")).toEqual([signal("kafka")]);
  });

  it("finds nested compose files", () => {
    const signals = detectSignals(["ops/docker-compose.yaml"]);
    expect(signals.map((s) => s.signalType)).toEqual(["docker-compose"]);
  });

  it("ignores file names that merely contain a technology name", () => {
    expect(detectSignals(["src/ui/sparkline.ts", "docs/kafkaesque.md", "lib/sqsUtil.ts"])).toEqual([]);
  });

  it("matches technology directories and manifests", () => {
    const signals = detectSignals(["config/kafka-topics.yml", "jobs/spark/etl.py"]);
    expect(signals).toEqual([signal("kafka", "config/kafka-topics.yml"), signal("spark", "jobs/spark/etl.py")]);
  });

  it("returns nothing for an empty repository", () => {
    expect(detectSignals([], "")).toEqual([]);
  });
});

describe("hasSignal", () => {
  it("checks by signal type", () => {
    const profile = makeProfile({ signals: [signal("helm", "chart/Chart.yaml")] });
    expect(hasSignal(profile, "helm")).toBe(true);
    expect(hasSignal(profile, "terraform")).toBe(false);
  });
});

describe("rankLanguages", () => {
  it("orders by file count, then name", () => {
    expect(rankLanguages(["a.py", "b.go", "c.py", "d.ts", "README.md"])).toEqual(["Python", "Go", "TypeScript"]);
  });
});

describe("firstParagraph", () => {
  it("skips headings and badges", () => {
    expect(firstParagraph(README)).toBe("Orders and payments service backed by Kafka.");
  });
});

describe("buildRepoProfile", () => {
  it("profiles a checkout on disk", () => {
    const profile = buildRepoProfile(root);
    expect(profile.repoName).toBe(basename(root));
    expect(profile.fileTree).toEqual([
      "LICENSE",
      "README.md",
      "docker-compose.yml",
      "infra/main.tf",
      "src/app.ts",
      "src/util.ts",
    ]);
    expect(profile.primaryLanguage).toBe("TypeScript");
    expect(profile.languages).toEqual(["TypeScript", "HCL"]);
    expect(profile.license).toBe("MIT");
    expect(profile.readmeSummary).toBe("Orders and payments service backed by Kafka.");
    expect(profile.signals.map((s) => s.signalType)).toEqual(["docker-compose", "terraform", "kafka"]);
  });

  it("applies overrides and exclusions", () => {
    const profile = buildRepoProfile(root, { repoName: "shop", description: "Shop backend" }, [], ["infra/**"]);
    expect(profile.repoName).toBe("shop");
    expect(profile.description).toBe("Shop backend");
    expect(profile.fileTree).not.toContain("infra/main.tf");
    expect(profile.languages).toEqual(["TypeScript"]);
  });
});
