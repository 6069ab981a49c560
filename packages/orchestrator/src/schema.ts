/**
 * On-disk shape of the solution log.
 *
 * ```json
 * {
 *   "last_updated": "2026-01-01T00:00:00.000Z",
 *   "total_solutions": 1,
 *   "router_stats": { "total_routed": 1, "by_agent": { "b": 1 }, "by_problem_type": { "code": 1 }, "last_routing": { … } },
 *   "solutions": [{ "timestamp": "…", "problem": "fix bug", "problem_type": "code", "solved_by": "b", "status": "SOLVED" }]
 * }
 * ```
 */

import {
  persistedRoutingRecordSchema,
  type RoutingStats,
  toPersistedRoute,
} from "@tandem/agent-router";
import { z } from "zod";
import type { SolutionRecord } from "./types.js";

const persistedSolutionSchema = z.object({
  timestamp: z.string(),
  problem: z.string(),
  problem_type: z.string(),
  solved_by: z.string().nullable(),
  status: z.enum(["SOLVED", "FAILED"]),
});

const persistedRouterStatsSchema = z.object({
  total_routed: z.number().int().nonnegative(),
  by_agent: z.record(z.number()),
  by_problem_type: z.record(z.number()),
  last_routing: persistedRoutingRecordSchema.nullable(),
});

export const solutionLogDocumentSchema = z.object({
  last_updated: z.string(),
  total_solutions: z.number().int().nonnegative(),
  router_stats: persistedRouterStatsSchema,
  solutions: z.array(persistedSolutionSchema),
});

export type SolutionLogDocument = z.infer<typeof solutionLogDocumentSchema>;
type PersistedSolution = z.infer<typeof persistedSolutionSchema>;
type PersistedRouterStats = z.infer<typeof persistedRouterStatsSchema>;

export function toPersistedSolution(record: SolutionRecord): PersistedSolution {
  return {
    timestamp: record.timestamp,
    problem: record.problem,
    problem_type: record.problemType,
    solved_by: record.solvedBy,
    status: record.status,
  };
}

export function fromPersistedSolution(record: PersistedSolution): SolutionRecord {
  return {
    timestamp: record.timestamp,
    problem: record.problem,
    problemType: record.problem_type,
    solvedBy: record.solved_by,
    status: record.status,
  };
}

export function toPersistedRouterStats(stats: RoutingStats): PersistedRouterStats {
  return {
    total_routed: stats.totalRouted,
    by_agent: { ...stats.byAgent },
    by_problem_type: { ...stats.byProblemType },
    last_routing: stats.lastRouting === null ? null : toPersistedRoute(stats.lastRouting),
  };
}
