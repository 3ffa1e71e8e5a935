// src/tool-contracts.ts — Tool contracts and the adapter registry
// The planner names tools by contract; the executor validates parameters
// against the contract before dispatching to an adapter.

import { z } from "zod";
import type { PrivacyMode } from "./types.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export type ToolCategory = "repo" | "diagram" | "chart" | "figma" | "image" | "doc" | "publish";

export interface ToolContract {
  name: string;
  description: string;
  category: ToolCategory;
  outputType: string;
  /** Least permissive privacy mode under which the tool may run. */
  privacyLevel: PrivacyMode;
  requiresAuth: boolean;
  params: z.AnyZodObject;
}

/**
 * Adapters are external collaborators. A result may embed an
 * `evidencePointer` payload, which the executor registers.
 */
export interface ToolAdapter {
  execute(params: Record<string, unknown>): Promise<unknown>;
}

export type ToolAdapterRegistry = Map<string, ToolAdapter>;

// ─── Validation ──────────────────────────────────────────────────────────────

/**
 * Validate parameters against a contract. Returns human-readable violations;
 * an empty list means the call may proceed.
 */
export function validateParams(
  contract: ToolContract,
  params: Record<string, unknown>,
): string[] {
  const result = contract.params.safeParse(params);
  if (result.success) return [];
  return result.error.issues.map(describeIssue);
}

function describeIssue(issue: z.ZodIssue): string {
  const name = issue.path.join(".");
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === "undefined") {
    return `Missing required parameter: ${name}`;
  }
  if (issue.code === z.ZodIssueCode.invalid_enum_value) {
    return `Parameter '${name}' must be one of ${issue.options.join(", ")}, got '${String(issue.received)}'`;
  }
  return `Parameter '${name}': ${issue.message}`;
}

// ─── Contracts ───────────────────────────────────────────────────────────────

const KG_REFERENCES = z.array(z.string());

function contract(c: ToolContract): [string, ToolContract] {
  return [c.name, c];
}

export const TOOL_CONTRACTS: ReadonlyMap<string, ToolContract> = new Map([
  contract({
    name: "repo.search",
    description: "Search repository files by keyword or regex pattern.",
    category: "repo",
    outputType: "json",
    privacyLevel: "standard",
    requiresAuth: false,
    params: z
      .object({
        query: z.string(),
        file_pattern: z.string().optional(),
        max_results: z.number().int().positive().optional(),
      })
      .passthrough(),
  }),
  contract({
    name: "repo.read",
    description: "Read a file or file range from the repository.",
    category: "repo",
    outputType: "string",
    privacyLevel: "permissive",
    requiresAuth: false,
    params: z
      .object({
        path: z.string(),
        start_line: z.number().int().positive().optional(),
        end_line: z.number().int().positive().optional(),
      })
      .passthrough(),
  }),
  contract({
    name: "repo.diff",
    description: "Get the diff between two git refs (commits, branches, tags).",
    category: "repo",
    outputType: "json",
    privacyLevel: "strict",
    requiresAuth: false,
    params: z
      .object({
        ref1: z.string(),
        ref2: z.string().optional(),
      })
      .passthrough(),
  }),
  contract({
    name: "repo.summarize",
    description: "Generate a concise summary of a file or directory.",
    category: "repo",
    outputType: "markdown",
    privacyLevel: "standard",
    requiresAuth: false,
    params: z
      .object({
        path: z.string(),
        max_tokens: z.number().int().positive().optional(),
      })
      .passthrough(),
  }),
  contract({
    name: "diagram.render",
    description: "Render a diagram from Mermaid, PlantUML, or Graphviz source.",
    category: "diagram",
    outputType: "svg",
    privacyLevel: "strict",
    requiresAuth: false,
    params: z
      .object({
        type: z.enum(["mermaid", "plantuml", "graphviz"]),
        spec: z.string(),
        output_format: z.enum(["svg", "png", "pdf"]).optional(),
        theme: z.string().optional(),
      })
      .passthrough(),
  }),
  contract({
    name: "chart.generate",
    description: "Generate a chart image from structured data.",
    category: "chart",
    outputType: "png",
    privacyLevel: "strict",
    requiresAuth: false,
    params: z
      .object({
        data: z.record(z.unknown()),
        chart_type: z.enum(["bar", "line", "pie", "scatter", "heatmap", "treemap"]),
        title: z.string().optional(),
        output_format: z.enum(["png", "svg"]).optional(),
      })
      .passthrough(),
  }),
  contract({
    name: "figma.create_frame",
    description: "Create a new Figma frame with specified layout.",
    category: "figma",
    outputType: "json",
    privacyLevel: "strict",
    requiresAuth: true,
    params: z
      .object({
        layout: z.record(z.unknown()),
        name: z.string(),
        file_key: z.string().optional(),
      })
      .passthrough(),
  }),
  contract({
    name: "figma.add_nodes",
    description: "Add visual nodes (boxes, arrows, text) to a Figma frame.",
    category: "figma",
    outputType: "json",
    privacyLevel: "strict",
    requiresAuth: true,
    params: z
      .object({
        frame_id: z.string(),
        nodes: z.array(z.unknown()),
      })
      .passthrough(),
  }),
  contract({
    name: "image.generate",
    description: "Generate an icon or illustration via image generation.",
    category: "image",
    outputType: "url",
    privacyLevel: "strict",
    requiresAuth: true,
    params: z
      .object({
        prompt: z.string(),
        style: z
          .enum(["flat-icon", "isometric", "hand-drawn", "technical", "photo-realistic"])
          .optional(),
        size: z.enum(["256x256", "512x512", "1024x1024"]).optional(),
      })
      .passthrough(),
  }),
  contract({
    name: "docx.refine",
    description: "Refine a Word document while retaining evidence links.",
    category: "doc",
    outputType: "docx",
    privacyLevel: "standard",
    requiresAuth: false,
    params: z
      .object({
        instructions: z.string(),
        references_to_kg: KG_REFERENCES,
        source_path: z.string().optional(),
      })
      .passthrough(),
  }),
  contract({
    name: "pptx.refine",
    description: "Refine a PowerPoint deck while retaining evidence links.",
    category: "doc",
    outputType: "pptx",
    privacyLevel: "standard",
    requiresAuth: false,
    params: z
      .object({
        instructions: z.string(),
        references_to_kg: KG_REFERENCES,
        source_path: z.string().optional(),
      })
      .passthrough(),
  }),
  contract({
    name: "confluence.publish",
    description: "Publish a page tree to Confluence.",
    category: "publish",
    outputType: "url",
    privacyLevel: "strict",
    requiresAuth: true,
    params: z
      .object({
        page_tree_model: z.record(z.unknown()),
        space_key: z.string(),
        parent_page_id: z.string().optional(),
      })
      .passthrough(),
  }),
]);

export function getContract(name: string): ToolContract | undefined {
  return TOOL_CONTRACTS.get(name);
}

/**
 * One line per tool, used in the planner's generative prompt.
 */
export function describeTools(): string {
  return [...TOOL_CONTRACTS.values()]
    .map((c) => {
      const params = Object.keys(c.params.shape).join(", ");
      return `- ${c.name}(${params}): ${c.description}`;
    })
    .join("\n");
}
