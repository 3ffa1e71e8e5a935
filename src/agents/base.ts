// src/agents/base.ts — Shared shape of the specialized domain agents
// Discover components → fixed-topology diagram → section (generative or
// templated) → one claim per component.

import type {
  AgentResult,
  EvidenceType,
  RepoProfile,
  SpecializedRole,
  Warning,
} from "../types.js";
import type { KnowledgeGraph } from "../knowledge-graph.js";
import type { EvidenceRegistry } from "../evidence-registry.js";
import { createClaim, createEvidencePointer } from "../evidence-registry.js";
import type { PrivacyGuard } from "../privacy-guard.js";
import type { GenerativeClient } from "../llm/client.js";
import { withFallback } from "../llm/fallback.js";
import { elapsedMs, makeResult } from "../agent-result.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface DomainComponent {
  name: string;
  kind: string;
  tech: string;
  /** Repo-relative file the component was found in, when known. */
  source?: string;
}

export interface AgentContext {
  profile: RepoProfile;
  graph: KnowledgeGraph;
  useGenerative: boolean;
  priorResults: AgentResult[];
}

export interface SpecializedAgent {
  readonly role: SpecializedRole;
  run(context: AgentContext): Promise<AgentResult>;
}

export interface AgentDeps {
  client: GenerativeClient | null;
  registry: EvidenceRegistry;
  guard: PrivacyGuard;
  warnings?: Warning[];
}

export interface SectionInput {
  title: string;
  components: DomainComponent[];
  profile: RepoProfile;
  graph: KnowledgeGraph;
}

export interface SectionBuilder {
  build(input: SectionInput): Promise<string>;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function signalTypes(profile: RepoProfile): Set<string> {
  return new Set(profile.signals.map((s) => s.signalType));
}

/**
 * File path of the first signal of the given type that was found on disk.
 */
export function signalSource(profile: RepoProfile, signalType: string): string | undefined {
  return profile.signals.find((s) => s.signalType === signalType && s.filePath)?.filePath;
}

export function componentFromSignal(
  profile: RepoProfile,
  signalType: string,
  component: Omit<DomainComponent, "source">,
): DomainComponent {
  const source = signalSource(profile, signalType);
  return source ? { ...component, source } : { ...component };
}

function evidenceTypeFor(path: string): EvidenceType {
  return /\.(ya?ml|json|toml|tf|ini|cfg|conf)$|Dockerfile$/i.test(path) ? "config_file" : "code_file";
}

// ─── Section builders ────────────────────────────────────────────────────────

export class TemplateSectionBuilder implements SectionBuilder {
  constructor(
    private readonly noun: string,
    private readonly subsection: { heading: string; body: string },
  ) {}

  async build({ title, components, profile }: SectionInput): Promise<string> {
    const lines = [
      `## ${title}: ${profile.repoName}`,
      "",
      `This repository contains **${components.length}** ${this.noun}(s):`,
      "",
    ];
    for (const c of components) {
      const source = c.source ? ` \`${c.source}\`` : "";
      lines.push(`- **${c.name}** (${c.tech}, ${c.kind})${source}`);
    }
    lines.push("", `### ${this.subsection.heading}`, "", this.subsection.body);
    return lines.join("\n");
  }
}

export class GenerativeSectionBuilder implements SectionBuilder {
  constructor(
    private readonly client: GenerativeClient,
    private readonly guard: PrivacyGuard,
    private readonly brief: string,
  ) {}

  async build({ title, components, profile, graph }: SectionInput): Promise<string> {
    const view = this.guard.sanitizeContext({
      repository: profile.repoName,
      description: profile.description.slice(0, 300),
      entities: graph.entities.slice(0, 15).map((e) => e.name),
      components: components.map((c) => ({ name: c.name, tech: c.tech, kind: c.kind, source: c.source ?? "n/a" })),
    });
    const system = [
      `You are a senior technical writer. Write a detailed Markdown "${title}" section ${this.brief}.`,
      "Use ## headers. Be specific to the listed components.",
      "Do NOT invent components that are not listed.",
    ].join(" ");
    const text = await this.client.chatText(
      system,
      `${JSON.stringify(view, null, 2)}\n\nWrite the ${title} section.`,
      { maxTokens: 1500 },
    );
    if (!text.trim()) throw new Error("Empty section from generative collaborator");
    return text;
  }
}

// ─── Base agent ──────────────────────────────────────────────────────────────

export abstract class DomainAgent implements SpecializedAgent {
  abstract readonly role: SpecializedRole;
  /** Artifact key prefix: `<prefix>Diagram`, `<prefix>Section`, `<prefix>Components`. */
  protected abstract readonly prefix: string;
  protected abstract readonly title: string;
  protected abstract readonly template: TemplateSectionBuilder;
  protected abstract readonly brief: string;

  constructor(protected readonly deps: AgentDeps) {}

  protected abstract discover(profile: RepoProfile): DomainComponent[];

  protected abstract diagram(components: DomainComponent[]): string;

  protected extraArtifacts(_components: DomainComponent[], _profile: RepoProfile): Record<string, unknown> {
    return {};
  }

  async run(context: AgentContext): Promise<AgentResult> {
    const start = performance.now();
    const components = this.discover(context.profile);
    const input: SectionInput = {
      title: this.title,
      components,
      profile: context.profile,
      graph: context.graph,
    };

    const client = this.deps.client;
    const generative =
      context.useGenerative && client ? new GenerativeSectionBuilder(client, this.deps.guard, this.brief) : null;
    const section = await withFallback(
      generative ? () => generative.build(input) : null,
      () => this.template.build(input),
      (message) => {
        this.deps.warnings?.push({
          level: "warn",
          module: this.role,
          message: `Generative section failed, using template: ${message}`,
        });
      },
    );

    const sectionId = `${this.prefix}Section`;
    const evidenceIds = this.registerClaims(sectionId, components);

    return makeResult(this.role, {
      artifacts: {
        [`${this.prefix}Diagram`]: this.diagram(components),
        [sectionId]: section.value,
        [`${this.prefix}Components`]: components,
        ...this.extraArtifacts(components, context.profile),
      },
      evidenceIds,
      warnings: section.error ? [section.error] : [],
      durationMs: elapsedMs(start),
      metadata: {
        componentCount: components.length,
        generativeUsed: !section.usedFallback,
      },
    });
  }

  /**
   * One claim per component against the section artifact, backed when the
   * component came from a file. Claims from an earlier run of this agent
   * are replaced.
   */
  private registerClaims(artifactId: string, components: DomainComponent[]): string[] {
    const { registry } = this.deps;
    registry.resetArtifact(artifactId);
    const evidenceIds: string[] = [];
    for (const c of components) {
      const ids: string[] = [];
      if (c.source) {
        const id = registry.registerPointer(
          createEvidencePointer({
            evidenceType: evidenceTypeFor(c.source),
            sourcePath: c.source,
            section: this.title,
            snippet: `${c.name} (${c.tech})`,
            confidence: 0.9,
          }),
        );
        ids.push(id);
        evidenceIds.push(id);
      }
      registry.registerClaim(
        createClaim({
          text: `${c.name} is a ${c.kind} (${c.tech}) in this repository`,
          artifactId,
          evidenceIds: ids,
          confidence: c.source ? 0.9 : 0.6,
        }),
      );
    }
    return evidenceIds;
  }
}
