import { describe, it, expect, vi } from "vitest";
import {
  DataPipelineAgent,
  EventFlowAgent,
  InfrastructureAgent,
  MlPipelineAgent,
  ServiceTopologyAgent,
  createSpecializedAgents,
} from "../src/agents/index.js";
import type { AgentContext, AgentDeps } from "../src/agents/index.js";
import { EvidenceRegistry } from "../src/evidence-registry.js";
import { PrivacyGuard } from "../src/privacy-guard.js";
import type { GenerativeClient } from "../src/llm/client.js";
import type { RepoProfile, Warning } from "../src/types.js";
import { failingClient, graphOf, makeProfile, signal } from "./helpers.js";

function deps(client: GenerativeClient | null = null): AgentDeps & { registry: EvidenceRegistry; warnings: Warning[] } {
  return { client, registry: new EvidenceRegistry(), guard: new PrivacyGuard(), warnings: [] };
}

function context(profile: RepoProfile, useGenerative = false): AgentContext {
  return { profile, graph: graphOf([]), useGenerative, priorResults: [] };
}

describe("createSpecializedAgents", () => {
  it("provides one agent per specialized role", () => {
    const agents = createSpecializedAgents(deps());
    expect([...agents.keys()].sort()).toEqual([
      "data-pipeline",
      "event-flow",
      "infrastructure",
      "ml-pipeline",
      "service-topology",
    ]);
  });
});

describe("ServiceTopologyAgent", () => {
  const profile = makeProfile({
    fileTree: ["docker-compose.yml", "services/api/Dockerfile", "k8s/web/deployment.yaml", "src/index.ts"],
  });

  it("discovers services and renders a templated section", async () => {
    const d = deps();
    const result = await new ServiceTopologyAgent(d).run(context(profile));

    expect(result.role).toBe("service-topology");
    expect(result.success).toBe(true);
    expect(result.artifacts.serviceTopologyDiagram).toBe(
      [
        "graph LR",
        '  docker_compose["docker-compose"] --> api["api"]',
        '  api["api"] --> web["web"]',
      ].join("\n"),
    );
    expect(result.artifacts.serviceTopologySection).toBe(
      [
        "## Architecture Overview: shop",
        "",
        "This repository contains **3** service(s):",
        "",
        "- **docker-compose** (docker, compose) `docker-compose.yml`",
        "- **api** (docker, docker) `services/api/Dockerfile`",
        "- **web** (kubernetes, k8s-deployment) `k8s/web/deployment.yaml`",
        "",
        "### Service Communication",
        "",
        "Services are listed in discovery order. Inter-service calls follow the relations recorded in the knowledge graph.",
      ].join("\n"),
    );
    expect(result.metadata).toEqual({ componentCount: 3, generativeUsed: false });
  });

  it("registers a backed claim per file-sourced service", async () => {
    const d = deps();
    const result = await new ServiceTopologyAgent(d).run(context(profile));
    const coverage = d.registry.computeCoverage("serviceTopologySection");
    expect(coverage.totalClaims).toBe(3);
    expect(coverage.backedClaims).toBe(3);
    expect(result.evidenceIds).toHaveLength(3);
    expect(d.registry.getPointer(result.evidenceIds[0])?.evidenceType).toBe("config_file");
  });

  it("renders a single service as a lone node", async () => {
    const result = await new ServiceTopologyAgent(deps()).run(context(makeProfile({ fileTree: ["Dockerfile"] })));
    expect(result.artifacts.serviceTopologyDiagram).toBe('graph LR\n  app["app"]');
  });
});

describe("EventFlowAgent", () => {
  const profile = makeProfile({ signals: [signal("kafka"), signal("sqs", "queues/sqs.yml"), signal("airflow")] });

  it("maps messaging signals to components around producer and consumer", async () => {
    const result = await new EventFlowAgent(deps()).run(context(profile));
    expect(result.artifacts.eventFlowDiagram).toBe(
      [
        "graph LR",
        '  Producer["Producer Service"]',
        '  Producer --> Kafka_Cluster["Kafka Cluster"]',
        '  Kafka_Cluster --> Consumer["Consumer Service"]',
        '  Producer --> SQS_Queue["SQS Queue"]',
        '  SQS_Queue --> Consumer["Consumer Service"]',
      ].join("\n"),
    );
    expect(result.artifacts.eventFlowComponents).toEqual([
      { name: "Kafka Cluster", kind: "broker", tech: "kafka" },
      { name: "SQS Queue", kind: "queue", tech: "sqs", source: "queues/sqs.yml" },
    ]);
  });

  it("records a component found only in the README as an assumption", async () => {
    const d = deps();
    await new EventFlowAgent(d).run(context(profile));
    const claims = d.registry.claimsForArtifact("eventFlowSection");
    expect(claims.map((c) => [c.text, c.isAssumption, c.confidence])).toEqual([
      ["Kafka Cluster is a broker (kafka) in this repository", true, 0.6],
      ["SQS Queue is a queue (sqs) in this repository", false, 0.9],
    ]);
  });

  it("uses the generative section when available", async () => {
    const client: GenerativeClient = {
      chatText: vi.fn().mockResolvedValue("## Events\n\nKafka carries orders."),
      chatJson: vi.fn(),
    };
    const result = await new EventFlowAgent(deps(client)).run(context(profile, true));
    expect(result.artifacts.eventFlowSection).toBe("## Events\n\nKafka carries orders.");
    expect(result.metadata.generativeUsed).toBe(true);
    const [system, user] = vi.mocked(client.chatText).mock.calls[0];
    expect(system).toContain("Do NOT invent components that are not listed.");
    expect(user).toContain('"name": "SQS Queue"');
  });

  it("falls back to the template when the collaborator fails", async () => {
    const d = deps(failingClient("rate limited"));
    const result = await new EventFlowAgent(d).run(context(profile, true));
    expect(String(result.artifacts.eventFlowSection)).toMatch(/^## Event-Driven Architecture: shop\n/);
    expect(result.warnings).toEqual(["rate limited"]);
    expect(d.warnings).toEqual([
      { level: "warn", module: "event-flow", message: "Generative section failed, using template: rate limited" },
    ]);
    expect(result.metadata.generativeUsed).toBe(false);
  });
});

describe("MlPipelineAgent", () => {
  it("chains framework and retrieval flows and emits a model card", async () => {
    const profile = makeProfile({ signals: [signal("pytorch"), signal("rag")] });
    const result = await new MlPipelineAgent(deps()).run(context(profile));
    expect(result.artifacts.mlPipelineDiagram).toBe(
      [
        "graph LR",
        '  Data["Data Sources"] --> Preprocessing["Preprocessing"]',
        '  Preprocessing --> PyTorch["PyTorch"]',
        '  PyTorch --> Model["Trained Model"]',
        '  Embeddings["Embeddings"] --> VectorDB["Vector Store"]',
        '  VectorDB --> Retrieval["Retrieval"]',
        '  Retrieval --> LLM["LLM"]',
        '  Model["Trained Model"] --> Inference["Inference API"]',
      ].join("\n"),
    );
    const card = String(result.artifacts.mlPipelineModelCard);
    expect(card.split("\n").slice(0, 6)).toEqual([
      "# Model Card: shop",
      "",
      "## Model Details",
      "- **Repository**: shop",
      "- **Frameworks**: pytorch, rag",
      "- **License**: MIT",
    ]);
  });
});

describe("DataPipelineAgent", () => {
  it("adds DAG files and draws lineage through the present stages", async () => {
    const profile = makeProfile({
      fileTree: ["dags/etl.py", "README.md"],
      signals: [signal("airflow", "dags/etl.py"), signal("dbt"), signal("warehouse")],
    });
    const result = await new DataPipelineAgent(deps()).run(context(profile));
    expect(result.artifacts.dataPipelineComponents).toEqual([
      { name: "Apache Airflow", kind: "orchestrator", tech: "airflow", source: "dags/etl.py" },
      { name: "dbt Models", kind: "transform", tech: "dbt" },
      { name: "Data Warehouse", kind: "storage", tech: "warehouse" },
      { name: "DAG: etl.py", kind: "dag", tech: "airflow", source: "dags/etl.py" },
    ]);
    expect(result.artifacts.dataPipelineDiagram).toBe(
      [
        "graph LR",
        '  Sources["Data Sources"] --> Landing["Landing Zone"]',
        '  Landing --> Transform["dbt Transform"]',
        '  Transform --> Warehouse["Data Warehouse"]',
        '  Warehouse --> Analytics["Analytics / BI"]',
      ].join("\n"),
    );
  });
});

describe("InfrastructureAgent", () => {
  it("lists IaC definitions and draws the cloud tree", async () => {
    const profile = makeProfile({
      fileTree: ["infra/main.tf", "charts/api/Chart.yaml"],
      signals: [signal("terraform", "infra/main.tf"), signal("helm", "charts/api/Chart.yaml")],
    });
    const d = deps();
    const result = await new InfrastructureAgent(d).run(context(profile));
    expect(result.artifacts.infrastructureComponents).toEqual([
      { name: "Terraform Configuration", kind: "iac", tech: "terraform", source: "infra/main.tf" },
      { name: "Helm Chart", kind: "chart", tech: "helm", source: "charts/api/Chart.yaml" },
      { name: "main.tf", kind: "terraform-file", tech: "terraform", source: "infra/main.tf" },
      { name: "api", kind: "helm-chart", tech: "helm", source: "charts/api/Chart.yaml" },
    ]);
    const diagram = String(result.artifacts.infrastructureDiagram).split("\n");
    expect(diagram[0]).toBe("graph TB");
    expect(diagram).toContain('  Cloud --> TF["Terraform"]');
    expect(diagram).toContain('  K8s --> Pods["Pods"]');
    expect(d.registry.computeCoverage("infrastructureSection").coveragePct).toBe(100);
  });
});
