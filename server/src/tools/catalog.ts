/**
 * Compact Tool Catalog
 *
 * Renders the registry's tool descriptions for prompts: name, one-line
 * description and example parameters, grouped by category.
 */

import type { ToolDescription } from "./types.js";

/**
 * Full catalog for tool reasoning, where the model must fill parameters.
 */
export function generateToolCatalog(tools: ToolDescription[]): string {
  if (tools.length === 0) return "No tools available.";

  const lines: string[] = [];
  for (const [category, entries] of groupByCategory(tools)) {
    lines.push(`### ${category}`);
    for (const t of entries) {
      lines.push(`- \`${t.name}\`: ${t.description}`);
      lines.push(`  example parameters: ${JSON.stringify(t.exampleParameters)}`);
    }
    lines.push("");
  }

  return lines.join("\n").trimEnd();
}

/**
 * Capability summary for the planner, which must not pick tools itself.
 */
export function generateCapabilitySummary(tools: ToolDescription[]): string {
  if (tools.length === 0) return "No tools available.";
  return tools.map(t => `- ${truncateDescription(t.description)}`).join("\n");
}

function groupByCategory(tools: ToolDescription[]): Map<string, ToolDescription[]> {
  const grouped = new Map<string, ToolDescription[]>();
  for (const t of tools) {
    const cat = t.category || "general";
    const bucket = grouped.get(cat);
    if (bucket) bucket.push(t);
    else grouped.set(cat, [t]);
  }
  return grouped;
}

/** First sentence, capped at 120 characters. */
export function truncateDescription(desc: string): string {
  const firstSentence = desc.match(/^[^.!?]+[.!?]/)?.[0] ?? desc;
  return firstSentence.length > 120
    ? firstSentence.substring(0, 117) + "..."
    : firstSentence;
}
