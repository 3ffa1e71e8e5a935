// src/agents/event-flow.ts — Brokers, queues and event buses

import type { RepoProfile } from "../types.js";
import type { DomainComponent } from "./base.js";
import { DomainAgent, TemplateSectionBuilder, componentFromSignal, signalTypes } from "./base.js";
import { node, sanitizeId } from "../mermaid.js";

const EVENT_COMPONENTS: readonly { signal: string; name: string; kind: string }[] = [
  { signal: "kafka", name: "Kafka Cluster", kind: "broker" },
  { signal: "sqs", name: "SQS Queue", kind: "queue" },
  { signal: "eventbridge", name: "EventBridge", kind: "bus" },
  { signal: "rabbitmq", name: "RabbitMQ", kind: "broker" },
  { signal: "nats", name: "NATS", kind: "broker" },
];

export class EventFlowAgent extends DomainAgent {
  readonly role = "event-flow";
  protected readonly prefix = "eventFlow";
  protected readonly title = "Event-Driven Architecture";
  protected readonly brief =
    "for an event-driven repository covering producers, consumers, topics or queues and delivery guarantees";
  protected readonly template = new TemplateSectionBuilder("messaging component", {
    heading: "Event Flow",
    body: "Producers publish to the components above; consumers subscribe downstream.",
  });

  protected discover(profile: RepoProfile): DomainComponent[] {
    const present = signalTypes(profile);
    return EVENT_COMPONENTS.filter((c) => present.has(c.signal)).map((c) =>
      componentFromSignal(profile, c.signal, { name: c.name, kind: c.kind, tech: c.signal }),
    );
  }

  protected diagram(components: DomainComponent[]): string {
    const lines = ["graph LR", `  ${node("Producer", "Producer Service")}`];
    for (const c of components) {
      lines.push(`  Producer --> ${node(c.name, c.name)}`);
      lines.push(`  ${sanitizeId(c.name)} --> ${node("Consumer", "Consumer Service")}`);
    }
    return lines.join("\n");
  }
}
