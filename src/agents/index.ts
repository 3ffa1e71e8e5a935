// src/agents/index.ts — Role → specialized agent map

import type { SpecializedRole } from "../types.js";
import type { AgentDeps, SpecializedAgent } from "./base.js";
import { ServiceTopologyAgent } from "./service-topology.js";
import { EventFlowAgent } from "./event-flow.js";
import { MlPipelineAgent } from "./ml-pipeline.js";
import { DataPipelineAgent } from "./data-pipeline.js";
import { InfrastructureAgent } from "./infrastructure.js";

export function createSpecializedAgents(deps: AgentDeps): ReadonlyMap<SpecializedRole, SpecializedAgent> {
  const agents: SpecializedAgent[] = [
    new ServiceTopologyAgent(deps),
    new EventFlowAgent(deps),
    new MlPipelineAgent(deps),
    new DataPipelineAgent(deps),
    new InfrastructureAgent(deps),
  ];
  return new Map(agents.map((a) => [a.role, a]));
}

export function isSpecializedRole(role: string, agents: ReadonlyMap<SpecializedRole, SpecializedAgent>): role is SpecializedRole {
  return [...agents.keys()].some((r) => r === role);
}

export type { AgentContext, AgentDeps, DomainComponent, SpecializedAgent } from "./base.js";
export { ServiceTopologyAgent, EventFlowAgent, MlPipelineAgent, DataPipelineAgent, InfrastructureAgent };
