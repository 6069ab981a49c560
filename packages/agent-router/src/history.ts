/**
 * Routing history: on-disk shape and statistics.
 *
 * ```json
 * {
 *   "last_updated": "2026-01-01T00:00:00.000Z",
 *   "total_routed": 1,
 *   "routes": [{ "timestamp": "…", "problem_type": "code", "selected_agent": "b", "rationale": "…" }]
 * }
 * ```
 */

import { z } from "zod";
import type { RoutingRecord, RoutingStats } from "./types.js";

export const persistedRoutingRecordSchema = z.object({
  timestamp: z.string(),
  problem_type: z.string(),
  selected_agent: z.string(),
  rationale: z.string(),
});

export const routingHistoryDocumentSchema = z.object({
  last_updated: z.string(),
  total_routed: z.number().int().nonnegative(),
  routes: z.array(persistedRoutingRecordSchema),
});

export type RoutingHistoryDocument = z.infer<typeof routingHistoryDocumentSchema>;
export type PersistedRoutingRecord = z.infer<typeof persistedRoutingRecordSchema>;

export function toPersistedRoute(record: RoutingRecord): PersistedRoutingRecord {
  return {
    timestamp: record.timestamp,
    problem_type: record.problemType,
    selected_agent: record.selectedAgent,
    rationale: record.rationale,
  };
}

export function fromPersistedRoute(record: PersistedRoutingRecord): RoutingRecord {
  return {
    timestamp: record.timestamp,
    problemType: record.problem_type,
    selectedAgent: record.selected_agent,
    rationale: record.rationale,
  };
}

export function computeRoutingStats(records: readonly RoutingRecord[]): RoutingStats {
  const byAgent: Record<string, number> = {};
  const byProblemType: Record<string, number> = {};
  for (const record of records) {
    byAgent[record.selectedAgent] = (byAgent[record.selectedAgent] ?? 0) + 1;
    byProblemType[record.problemType] = (byProblemType[record.problemType] ?? 0) + 1;
  }
  return {
    totalRouted: records.length,
    byAgent,
    byProblemType,
    lastRouting: records.at(-1) ?? null,
  };
}
