import type { AgentRouter, RoutingReport, RoutingStats } from "@tandem/agent-router";
import type { Clock } from "@tandem/core";

export type SolutionStatus = "SOLVED" | "FAILED";

/**
 * Outcome of one `solve` call. "Solved" means routed and acknowledged; the
 * actual work happens in the selected agent.
 */
export interface SolutionRecord {
  /** ISO 8601 */
  readonly timestamp: string;
  readonly problem: string;
  readonly problemType: string;
  /** Null when routing failed. */
  readonly solvedBy: string | null;
  readonly status: SolutionStatus;
}

export interface OrchestrationStats {
  readonly totalSolutions: number;
  readonly totalSolved: number;
  /** totalSolved / totalSolutions; 0 with no records. */
  readonly successRate: number;
  readonly routingStats: RoutingStats;
  readonly lastSolution: SolutionRecord | null;
}

export interface OrchestrationReport {
  /** ISO 8601 */
  readonly generatedAt: string;
  readonly stats: OrchestrationStats;
  readonly routing: RoutingReport;
}

export interface OrchestratorConfig {
  /** Solution records kept in the persisted document (default: 100). */
  readonly retention?: number;
}

export interface OrchestratorOptions extends OrchestratorConfig {
  readonly router: AgentRouter;
  /** Where the solution log persists itself. In-memory only when omitted. */
  readonly statePath?: string;
  readonly clock?: Clock;
}
