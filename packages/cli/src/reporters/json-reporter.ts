import type { RoutingStats } from "@tandem/agent-router";
import type { MalformedImportError } from "@tandem/errors";
import type { KnowledgeSummary, SyncStats } from "@tandem/federation";
import type { StatusReporter } from "./types.js";

// ---------------------------------------------------------------------------
// JSON reporter
// ---------------------------------------------------------------------------

/**
 * Renders results as formatted JSON.
 */
export class JsonReporter implements StatusReporter {
  readonly name = "json";

  syncStats(stats: SyncStats): string {
    return JSON.stringify(stats, null, 2);
  }

  routingStats(stats: RoutingStats): string {
    return JSON.stringify(stats, null, 2);
  }

  knowledgeSummary(
    summary: KnowledgeSummary,
    malformed: readonly MalformedImportError[],
  ): string {
    // Errors become plain objects
    const serializable = {
      ...summary,
      malformed: malformed.map((error) => ({
        index: error.entryIndex,
        id: error.entryId,
        issues: error.issues,
      })),
    };
    return JSON.stringify(serializable, null, 2);
  }
}
