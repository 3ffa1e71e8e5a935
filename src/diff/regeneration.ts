// src/diff/regeneration.ts — Decide which output formats to rebuild
// Rendering itself belongs to format-specific collaborators.

import type { DocFormat, ImpactReport, RegenerationResult, Warning } from "../types.js";

export type FormatRenderer = (report: ImpactReport) => Promise<void>;

export type FormatRenderers = Partial<Record<DocFormat, FormatRenderer>>;

/**
 * No deltas: nothing to do, reported as success with a skip reason.
 * With renderers supplied, a format whose renderer rejects is dropped from
 * `regenerated` and reported as a warning.
 */
export async function planRegeneration(
  report: ImpactReport,
  renderers: FormatRenderers = {},
  warnings: Warning[] = [],
): Promise<RegenerationResult> {
  if (report.totalDeltas === 0) {
    return {
      success: true,
      regenerated: [],
      impactedEntities: [],
      skippedReason: "No impacted entities",
    };
  }

  const regenerated: DocFormat[] = [];
  for (const format of report.impactedFormats) {
    const render = renderers[format];
    if (!render) {
      regenerated.push(format);
      continue;
    }
    try {
      await render(report);
      regenerated.push(format);
    } catch (err) {
      warnings.push({
        level: "warn",
        module: "regeneration",
        message: `Regenerating ${format} failed: ${err instanceof Error ? err.message : String(err)}`,
      });
    }
  }

  return {
    success: true,
    regenerated,
    impactedEntities: report.entityDeltas.map((d) => d.entityId),
  };
}
