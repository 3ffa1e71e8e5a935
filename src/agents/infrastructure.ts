// src/agents/infrastructure.ts — Infrastructure-as-code: Terraform, Helm, Pulumi, CloudFormation

import type { RepoProfile } from "../types.js";
import type { DomainComponent } from "./base.js";
import { DomainAgent, TemplateSectionBuilder, componentFromSignal, signalTypes } from "./base.js";
import { node } from "../mermaid.js";

const IAC_COMPONENTS: readonly { signal: string; name: string; kind: string }[] = [
  { signal: "terraform", name: "Terraform Configuration", kind: "iac" },
  { signal: "helm", name: "Helm Chart", kind: "chart" },
  { signal: "pulumi", name: "Pulumi Program", kind: "iac" },
  { signal: "cloudformation", name: "CloudFormation Stack", kind: "iac" },
];

export class InfrastructureAgent extends DomainAgent {
  readonly role = "infrastructure";
  protected readonly prefix = "infrastructure";
  protected readonly title = "Infrastructure";
  protected readonly brief =
    "for an infrastructure-as-code repository covering provisioned resources, environments and deployment";
  protected readonly template = new TemplateSectionBuilder("infrastructure resource", {
    heading: "Provisioning",
    body: "Resources above are provisioned from the listed definitions into the target cloud account.",
  });

  protected discover(profile: RepoProfile): DomainComponent[] {
    const present = signalTypes(profile);
    const resources = IAC_COMPONENTS.filter((c) => present.has(c.signal)).map((c) =>
      componentFromSignal(profile, c.signal, { name: c.name, kind: c.kind, tech: c.signal }),
    );
    for (const path of profile.fileTree) {
      const parts = path.split("/");
      if (path.endsWith(".tf")) {
        resources.push({ name: parts[parts.length - 1], kind: "terraform-file", tech: "terraform", source: path });
      } else if (parts[parts.length - 1] === "Chart.yaml") {
        const name = parts.length > 1 ? parts[parts.length - 2] : "chart";
        resources.push({ name, kind: "helm-chart", tech: "helm", source: path });
      }
    }
    return resources;
  }

  protected diagram(resources: DomainComponent[]): string {
    const techs = new Set(resources.map((r) => r.tech));
    const lines = ["graph TB", `  ${node("Cloud", "Cloud Provider")}`];
    if (techs.has("terraform")) {
      lines.push(`  Cloud --> ${node("TF", "Terraform")}`);
      lines.push(`  TF --> ${node("VPC", "VPC / Network")}`);
      lines.push(`  TF --> ${node("Compute", "Compute")}`);
      lines.push(`  TF --> ${node("Storage", "Storage")}`);
      lines.push(`  TF --> ${node("DB", "Database")}`);
    }
    if (techs.has("helm")) {
      lines.push(`  Cloud --> ${node("Helm", "Helm Charts")}`);
      lines.push(`  Helm --> ${node("K8s", "Kubernetes Cluster")}`);
      lines.push(`  K8s --> ${node("Pods", "Pods")}`);
      lines.push(`  K8s --> ${node("Services", "Services")}`);
    }
    if (techs.has("pulumi")) lines.push(`  Cloud --> ${node("Pulumi", "Pulumi")}`);
    if (techs.has("cloudformation")) lines.push(`  Cloud --> ${node("CFN", "CloudFormation")}`);
    return lines.join("\n");
  }
}
