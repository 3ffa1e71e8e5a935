// src/tools/diagram-tool.ts — diagram.render adapter
// Rasterizing is left to an external renderer; this adapter records the
// diagram source as evidence and returns it for embedding.

import { z } from "zod";
import type { ToolAdapter } from "../tool-contracts.js";

const RenderParams = z.object({
  type: z.enum(["mermaid", "plantuml", "graphviz"]),
  spec: z.string(),
  output_format: z.enum(["svg", "png", "pdf"]).default("svg"),
  theme: z.string().default("default"),
});

const SOURCE_HEADERS: Record<z.infer<typeof RenderParams>["type"], RegExp> = {
  mermaid: /^\s*(graph|flowchart|sequenceDiagram|classDiagram|stateDiagram|erDiagram|gantt|pie|mindmap)\b/,
  plantuml: /^\s*@startuml\b/,
  graphviz: /^\s*(strict\s+)?(di)?graph\b/,
};

export class DiagramRenderTool implements ToolAdapter {
  async execute(params: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { type, spec, output_format, theme } = RenderParams.parse(params);
    if (!spec.trim()) {
      throw new Error("Diagram source is empty");
    }
    if (!SOURCE_HEADERS[type].test(spec)) {
      throw new Error(`Diagram source does not look like ${type}`);
    }

    return {
      type,
      outputFormat: output_format,
      theme,
      source: spec,
      rendered: false,
      lineCount: spec.split("\n").length,
      evidencePointer: {
        evidenceType: "diagram_source",
        section: `${type} diagram`,
        snippet: spec,
        confidence: 0.9,
        metadata: { outputFormat: output_format },
      },
    };
  }
}
