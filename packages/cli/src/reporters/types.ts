import type { RoutingStats } from "@tandem/agent-router";
import type { MalformedImportError } from "@tandem/errors";
import type { KnowledgeSummary, SyncStats } from "@tandem/federation";
import type { OutputFormat } from "../args.js";

/**
 * Formats command results for output. Implementations are pure.
 */
export interface StatusReporter {
  readonly name: OutputFormat;
  syncStats(stats: SyncStats): string;
  routingStats(stats: RoutingStats): string;
  knowledgeSummary(
    summary: KnowledgeSummary,
    malformed: readonly MalformedImportError[],
  ): string;
}
