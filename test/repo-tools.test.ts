import { describe, it, expect, afterAll } from "vitest";
import { rmSync } from "node:fs";
import {
  createLocalAdapters,
  DiagramRenderTool,
  RepoReadTool,
  RepoSearchTool,
  RepoSummarizeTool,
} from "../src/tools/index.js";
import { tempRepo } from "./helpers.js";

const FILES = {
  "README.md": "# Shop\n\n![badge](x)\n\nOrders and payments service backed by Kafka.\n\nMore.",
  "docker-compose.yml": "services:\n  api:\n    image: shop/api\n",
  "infra/main.tf": 'resource "aws_s3_bucket" "assets" {}\n',
  "src/app.ts": 'import x;\nexport const topic = "orders";\nexport default topic;',
  "src/util.ts": "export {};\n",
};
const root = tempRepo(FILES);
const files = Object.keys(FILES).sort();

afterAll(() => {
  rmSync(root, { recursive: true, force: true });
});

describe("RepoSearchTool", () => {
  const tool = new RepoSearchTool(root, files);

  it("finds content matches with line numbers", async () => {
    const result = await tool.execute({ query: "kafka" });
    expect(result.matches).toEqual([
      { path: "README.md", line: 5, snippet: "Orders and payments service backed by Kafka." },
    ]);
    expect(result.evidencePointer).toMatchObject({
      evidenceType: "readme_section",
      sourcePath: "README.md",
      lineStart: 5,
    });
  });

  it("matches file paths before content", async () => {
    const result = await tool.execute({ query: "main\\.tf" });
    expect(result.matches).toEqual([{ path: "infra/main.tf", line: 0, snippet: "infra/main.tf" }]);
    expect(result.evidencePointer).toMatchObject({ evidenceType: "config_file", lineStart: undefined });
  });

  it("limits the search to file_pattern", async () => {
    const result = await tool.execute({ query: "export", file_pattern: "src/util.ts" });
    expect(result.matches).toEqual([{ path: "src/util.ts", line: 1, snippet: "export {};" }]);
  });

  it("treats an invalid regular expression as text", async () => {
    const result = await tool.execute({ query: "(orders" });
    expect(result.total).toBe(0);
    expect(result.evidencePointer).toBeUndefined();
  });
});

describe("RepoReadTool", () => {
  const tool = new RepoReadTool(root);

  it("reads a line range", async () => {
    const result = await tool.execute({ path: "src/app.ts", start_line: 2, end_line: 3 });
    expect(result).toMatchObject({
      content: 'export const topic = "orders";\nexport default topic;',
      lineStart: 2,
      lineEnd: 3,
      totalLines: 3,
    });
  });

  it("refuses paths outside the repository", async () => {
    await expect(tool.execute({ path: "../secret" })).rejects.toThrow("Path escapes the repository: ../secret");
  });
});

describe("RepoSummarizeTool", () => {
  const tool = new RepoSummarizeTool(root, files);

  it("summarizes a directory", async () => {
    const result = await tool.execute({ path: "src" });
    expect(result.summary).toBe("## src/\n\n2 files; most common: .ts (2)\n\n- app.ts\n- util.ts");
  });

  it("summarizes a file by its headings", async () => {
    const result = await tool.execute({ path: "README.md" });
    expect(result.summary).toBe("## README.md\n\n7 lines\n\nSections:\n- Shop");
  });

  it("truncates to the token budget", async () => {
    const result = await tool.execute({ path: "src", max_tokens: 2 });
    expect(result.summary).toBe("## src/\n");
  });
});

describe("DiagramRenderTool", () => {
  const tool = new DiagramRenderTool();

  it("returns the source with render metadata", async () => {
    const result = await tool.execute({ type: "mermaid", spec: "graph LR\n  A --> B" });
    expect(result).toMatchObject({ type: "mermaid", outputFormat: "svg", theme: "default", rendered: false, lineCount: 2 });
  });

  it("rejects a source that does not match the diagram type", async () => {
    await expect(tool.execute({ type: "plantuml", spec: "graph LR" })).rejects.toThrow(
      "Diagram source does not look like plantuml",
    );
  });

  it("rejects an empty source", async () => {
    await expect(tool.execute({ type: "mermaid", spec: "  " })).rejects.toThrow("Diagram source is empty");
  });
});

describe("createLocalAdapters", () => {
  it("registers repo.diff only with a diff provider", () => {
    const adapters = createLocalAdapters({ rootDir: root, files });
    expect([...adapters.keys()]).toEqual(["repo.search", "repo.read", "repo.summarize", "diagram.render"]);
  });
});
