// src/agents/data-pipeline.ts — Orchestrators, transforms, compute and warehouses

import type { RepoProfile } from "../types.js";
import type { DomainComponent } from "./base.js";
import { DomainAgent, TemplateSectionBuilder, componentFromSignal, signalTypes } from "./base.js";
import { node } from "../mermaid.js";

const DATA_COMPONENTS: readonly { signal: string; name: string; kind: string }[] = [
  { signal: "airflow", name: "Apache Airflow", kind: "orchestrator" },
  { signal: "dbt", name: "dbt Models", kind: "transform" },
  { signal: "spark", name: "Apache Spark", kind: "compute" },
  { signal: "warehouse", name: "Data Warehouse", kind: "storage" },
];

export class DataPipelineAgent extends DomainAgent {
  readonly role = "data-pipeline";
  protected readonly prefix = "dataPipeline";
  protected readonly title = "Data Architecture";
  protected readonly brief =
    "for a data-engineering repository covering orchestration, transformations, lineage and storage";
  protected readonly template = new TemplateSectionBuilder("data component", {
    heading: "Data Lineage",
    body: "Data lands from sources, is transformed and processed, then loaded into the warehouse for analytics.",
  });

  protected discover(profile: RepoProfile): DomainComponent[] {
    const present = signalTypes(profile);
    const components = DATA_COMPONENTS.filter((c) => present.has(c.signal)).map((c) =>
      componentFromSignal(profile, c.signal, { name: c.name, kind: c.kind, tech: c.signal }),
    );
    for (const path of profile.fileTree) {
      if (path.includes("dags/") && path.endsWith(".py")) {
        components.push({ name: `DAG: ${path.split("/").pop() ?? path}`, kind: "dag", tech: "airflow", source: path });
      }
    }
    return components;
  }

  protected diagram(components: DomainComponent[]): string {
    const has = (kind: string) => components.some((c) => c.kind === kind);
    const lines = ["graph LR", `  ${node("Sources", "Data Sources")} --> ${node("Landing", "Landing Zone")}`];
    let prev = "Landing";
    if (has("transform")) {
      lines.push(`  ${prev} --> ${node("Transform", "dbt Transform")}`);
      prev = "Transform";
    }
    if (has("compute")) {
      lines.push(`  ${prev} --> ${node("Spark", "Spark Processing")}`);
      prev = "Spark";
    }
    if (has("storage")) {
      lines.push(`  ${prev} --> ${node("Warehouse", "Data Warehouse")}`);
      lines.push(`  Warehouse --> ${node("Analytics", "Analytics / BI")}`);
    }
    return lines.join("\n");
  }
}
