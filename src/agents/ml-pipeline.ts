// src/agents/ml-pipeline.ts — Frameworks, model hubs, RAG and training pipelines

import type { RepoProfile } from "../types.js";
import type { DomainComponent } from "./base.js";
import { DomainAgent, TemplateSectionBuilder, componentFromSignal, signalTypes } from "./base.js";
import { node, sanitizeId } from "../mermaid.js";

const ML_COMPONENTS: readonly { signal: string; name: string; kind: string; tech: string }[] = [
  { signal: "pytorch", name: "PyTorch", kind: "framework", tech: "pytorch" },
  { signal: "tensorflow", name: "TensorFlow", kind: "framework", tech: "tensorflow" },
  { signal: "huggingface", name: "HuggingFace", kind: "hub", tech: "huggingface" },
  { signal: "vector-db", name: "Vector Database", kind: "store", tech: "vector-db" },
  { signal: "rag", name: "RAG Pipeline", kind: "pipeline", tech: "rag" },
  { signal: "ml-training", name: "Training Pipeline", kind: "pipeline", tech: "training" },
];

export class MlPipelineAgent extends DomainAgent {
  readonly role = "ml-pipeline";
  protected readonly prefix = "mlPipeline";
  protected readonly title = "ML Architecture";
  protected readonly brief =
    "for a machine-learning repository covering data flow, training, model artifacts and inference serving";
  protected readonly template = new TemplateSectionBuilder("ML component", {
    heading: "Pipeline Overview",
    body: "Data flows from sources through preprocessing into training; trained models are served behind an inference API.",
  });

  protected discover(profile: RepoProfile): DomainComponent[] {
    const present = signalTypes(profile);
    return ML_COMPONENTS.filter((c) => present.has(c.signal)).map((c) =>
      componentFromSignal(profile, c.signal, { name: c.name, kind: c.kind, tech: c.tech }),
    );
  }

  protected diagram(components: DomainComponent[]): string {
    const lines = [
      "graph LR",
      `  ${node("Data", "Data Sources")} --> ${node("Preprocessing", "Preprocessing")}`,
    ];
    for (const c of components) {
      if (c.kind === "framework") {
        lines.push(`  Preprocessing --> ${node(c.name, c.name)}`);
        lines.push(`  ${sanitizeId(c.name)} --> ${node("Model", "Trained Model")}`);
      } else if (c.tech === "rag") {
        lines.push(`  ${node("Embeddings", "Embeddings")} --> ${node("VectorDB", "Vector Store")}`);
        lines.push(`  VectorDB --> ${node("Retrieval", "Retrieval")}`);
        lines.push(`  Retrieval --> ${node("LLM", "LLM")}`);
      }
    }
    lines.push(`  ${node("Model", "Trained Model")} --> ${node("Inference", "Inference API")}`);
    return lines.join("\n");
  }

  protected extraArtifacts(components: DomainComponent[], profile: RepoProfile): Record<string, unknown> {
    return { mlPipelineModelCard: buildModelCard(components, profile) };
  }
}

export function buildModelCard(components: DomainComponent[], profile: RepoProfile): string {
  const techs = components.map((c) => c.tech).join(", ") || "N/A";
  return [
    `# Model Card: ${profile.repoName}`,
    "",
    "## Model Details",
    `- **Repository**: ${profile.repoName}`,
    `- **Frameworks**: ${techs}`,
    `- **License**: ${profile.license || "See repository LICENSE file"}`,
    "",
    "## Intended Use",
    "Not documented yet.",
    "",
    "## Training Data",
    "Not documented yet.",
    "",
    "## Evaluation",
    "Not documented yet.",
    "",
    "## Ethical Considerations",
    "Not documented yet.",
    "",
  ].join("\n");
}
