import type { KnowledgeEntry } from "@tandem/core";

export interface KnowledgeSummary {
  readonly totalEntries: number;
  /** Entry count per category. */
  readonly categories: Readonly<Record<string, number>>;
  /** 0 when there are no entries. */
  readonly minConfidence: number;
  /** 0 when there are no entries. */
  readonly avgConfidence: number;
}

export function summarizeKnowledge(entries: readonly KnowledgeEntry[]): KnowledgeSummary {
  const categories: Record<string, number> = {};
  let total = 0;
  let min = Number.POSITIVE_INFINITY;

  for (const entry of entries) {
    categories[entry.category] = (categories[entry.category] ?? 0) + 1;
    total += entry.confidence;
    min = Math.min(min, entry.confidence);
  }

  return {
    totalEntries: entries.length,
    categories,
    minConfidence: entries.length > 0 ? min : 0,
    avgConfidence: entries.length > 0 ? total / entries.length : 0,
  };
}
