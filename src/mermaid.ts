// src/mermaid.ts — Mermaid diagram helpers
// Node ids and quoted labels shared by the graph and the agents.

/**
 * Sanitize an arbitrary identifier into a valid Mermaid node ID.
 */
export function sanitizeId(name: string): string {
  const id = name.replace(/[^a-zA-Z0-9]/g, "_");
  return /^[0-9]/.test(id) ? `n_${id}` : id;
}

/**
 * Quote a display label; Mermaid has no escape for double quotes.
 */
export function quoteLabel(label: string): string {
  return `"${label.replace(/"/g, "'")}"`;
}

/**
 * Allocates node ids so that distinct keys never share one: a key whose
 * sanitized form is taken gets a numeric suffix (web-app → web_app,
 * web_app → web_app_2).
 */
export class NodeIdAllocator {
  private readonly byKey = new Map<string, string>();
  private readonly used = new Set<string>();

  idFor(key: string, name = key): string {
    const existing = this.byKey.get(key);
    if (existing !== undefined) return existing;
    const base = sanitizeId(name);
    let id = base;
    for (let n = 2; this.used.has(id); n++) id = `${base}_${n}`;
    this.used.add(id);
    this.byKey.set(key, id);
    return id;
  }
}

export function node(id: string, label: string): string {
  return `${sanitizeId(id)}[${quoteLabel(label)}]`;
}

/**
 * Chain node labels into a linear left-to-right flow: a --> b --> c.
 */
export function chain(labels: string[]): string[] {
  const lines: string[] = [];
  for (let i = 0; i + 1 < labels.length; i++) {
    lines.push(`  ${node(labels[i], labels[i])} --> ${node(labels[i + 1], labels[i + 1])}`);
  }
  return lines;
}
