// src/tools/index.ts — Default adapter registry for a local checkout

import type { ToolAdapterRegistry } from "../tool-contracts.js";
import type { DiffProvider } from "../diff/diff-collector.js";
import { RepoDiffTool, RepoReadTool, RepoSearchTool, RepoSummarizeTool } from "./repo-tools.js";
import { DiagramRenderTool } from "./diagram-tool.js";

export interface LocalAdapterOptions {
  rootDir: string;
  /** Repo-relative paths, as in RepoProfile.fileTree. */
  files: readonly string[];
  diffProvider?: DiffProvider;
}

export function createLocalAdapters(options: LocalAdapterOptions): ToolAdapterRegistry {
  const adapters: ToolAdapterRegistry = new Map();
  adapters.set("repo.search", new RepoSearchTool(options.rootDir, options.files));
  adapters.set("repo.read", new RepoReadTool(options.rootDir));
  adapters.set("repo.summarize", new RepoSummarizeTool(options.rootDir, options.files));
  adapters.set("diagram.render", new DiagramRenderTool());
  if (options.diffProvider) {
    adapters.set("repo.diff", new RepoDiffTool(options.diffProvider, options.rootDir));
  }
  return adapters;
}

export { RepoDiffTool, RepoReadTool, RepoSearchTool, RepoSummarizeTool, DiagramRenderTool };
