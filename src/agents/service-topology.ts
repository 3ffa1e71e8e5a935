// src/agents/service-topology.ts — Containers, compose files and k8s deployments

import type { RepoProfile } from "../types.js";
import type { DomainComponent } from "./base.js";
import { DomainAgent, TemplateSectionBuilder } from "./base.js";
import { chain, node } from "../mermaid.js";

export class ServiceTopologyAgent extends DomainAgent {
  readonly role = "service-topology";
  protected readonly prefix = "serviceTopology";
  protected readonly title = "Architecture Overview";
  protected readonly brief =
    "for a containerized, multi-service repository covering service responsibilities, deployment topology and scaling";
  protected readonly template = new TemplateSectionBuilder("service", {
    heading: "Service Communication",
    body: "Services are listed in discovery order. Inter-service calls follow the relations recorded in the knowledge graph.",
  });

  protected discover(profile: RepoProfile): DomainComponent[] {
    const services: DomainComponent[] = [];
    for (const path of profile.fileTree) {
      const parts = path.split("/");
      const parent = parts.length > 1 ? parts[parts.length - 2] : undefined;
      if (path.includes("docker-compose")) {
        services.push({ name: "docker-compose", kind: "compose", tech: "docker", source: path });
      } else if (/deployment\.ya?ml$/.test(path)) {
        services.push({ name: parent ?? "unknown", kind: "k8s-deployment", tech: "kubernetes", source: path });
      } else if (path.endsWith("Dockerfile")) {
        services.push({ name: parent ?? "app", kind: "docker", tech: "docker", source: path });
      }
    }
    return services;
  }

  /**
   * Services chained left to right in discovery order; one node per name.
   */
  protected diagram(services: DomainComponent[]): string {
    const names = [...new Set(services.map((s) => s.name))];
    const lines = ["graph LR"];
    if (names.length === 1) lines.push(`  ${node(names[0], names[0])}`);
    lines.push(...chain(names));
    return lines.join("\n");
  }
}
