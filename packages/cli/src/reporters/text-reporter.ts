import type { RoutingStats } from "@tandem/agent-router";
import { formatDirection } from "@tandem/core";
import type { MalformedImportError } from "@tandem/errors";
import type { KnowledgeSummary, SyncStats } from "@tandem/federation";
import type { StatusReporter } from "./types.js";

// ---------------------------------------------------------------------------
// Layout helpers
// ---------------------------------------------------------------------------

type Row = readonly [label: string, value: string];

/** Title line, then one indented row per pair with values aligned. */
function section(title: string, rows: readonly Row[]): string[] {
  if (rows.length === 0) {
    return [title, "  (none)"];
  }
  const width = Math.max(...rows.map(([label]) => label.length));
  return [title, ...rows.map(([label, value]) => `  ${label.padEnd(width)}  ${value}`)];
}

function countRows(counts: Readonly<Record<string, number>>): Row[] {
  return Object.entries(counts).map(([key, count]): Row => [key, String(count)]);
}

// ---------------------------------------------------------------------------
// Text reporter
// ---------------------------------------------------------------------------

/**
 * Renders plain aligned text, one section per block.
 */
export class TextReporter implements StatusReporter {
  readonly name = "text";

  syncStats(stats: SyncStats): string {
    return section("Sync stats", [
      ["Total", String(stats.total)],
      [formatDirection({ from: "A", to: "B" }), String(stats.aToB)],
      [formatDirection({ from: "B", to: "A" }), String(stats.bToA)],
      ["Last sync", stats.lastSync ?? "never"],
    ]).join("\n");
  }

  routingStats(stats: RoutingStats): string {
    const last = stats.lastRouting;
    return [
      ...section("Routing stats", [
        ["Total routed", String(stats.totalRouted)],
        [
          "Last routing",
          last ? `${last.selectedAgent} for ${last.problemType} at ${last.timestamp}` : "never",
        ],
      ]),
      ...section("By agent", countRows(stats.byAgent)),
      ...section("By problem type", countRows(stats.byProblemType)),
    ].join("\n");
  }

  knowledgeSummary(
    summary: KnowledgeSummary,
    malformed: readonly MalformedImportError[],
  ): string {
    const lines = [
      ...section("Knowledge summary", [
        ["Entries", String(summary.totalEntries)],
        ["Min confidence", summary.minConfidence.toFixed(2)],
        ["Avg confidence", summary.avgConfidence.toFixed(2)],
        ["Malformed", String(malformed.length)],
      ]),
      ...section("Categories", countRows(summary.categories)),
    ];
    if (malformed.length > 0) {
      lines.push("Malformed entries", ...malformed.map((error) => `  ${error.message}`));
    }
    return lines.join("\n");
  }
}
