import type {
  AgentDescriptor,
  Clock,
  KnowledgeCollaborator,
  LearningChannel,
} from "@tandem/core";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Seed for one pool member. */
export interface AgentConfig {
  readonly name: string;
  /** Default: true */
  readonly available?: boolean;
  /** Non-negative integer. Default: 0 */
  readonly currentLoad?: number;
}

export interface AgentRouterConfig {
  /** Pool members in registration order. Order breaks load ties. */
  readonly agents: readonly AgentConfig[];
  /** Agent returned for `preferLocal` selections when available. Must name a pool member. */
  readonly localAgent?: string;
  /** Routing records kept in the persisted document (default: 100). */
  readonly retention?: number;
  /** Budget for each advisor call in ms (default: 5000). */
  readonly adviceTimeoutMs?: number;
}

export interface ResolvedAgentRouterConfig {
  readonly agents: readonly AgentDescriptor[];
  readonly localAgent: string | undefined;
  readonly retention: number;
  readonly adviceTimeoutMs: number;
}

export interface AgentRouterOptions extends AgentRouterConfig {
  /** Where the routing history persists itself. In-memory only when omitted. */
  readonly statePath?: string;
  readonly clock?: Clock;
  /**
   * Advisory input. `chat` is asked about load ties and its pick is kept
   * in the rationale; `query` supplies report insights and recovery advice.
   * Never changes the selected agent.
   */
  readonly advisor?: Pick<KnowledgeCollaborator, "chat" | "query">;
  /** Receives one `routing_decision` record per selection. */
  readonly learning?: LearningChannel;
}

// ---------------------------------------------------------------------------
// Selection
// ---------------------------------------------------------------------------

export interface SelectOptions {
  /** Return the local agent when it is available. Default: false */
  readonly preferLocal?: boolean;
  /** Free text handed to the advisor. */
  readonly description?: string;
}

export interface SelectionContext {
  readonly problemType: string;
}

/** Outcome of a strategy over a pool snapshot. */
export interface Selection {
  readonly agent: AgentDescriptor;
  /** Every candidate the strategy considered equally good, in pool order. */
  readonly tied: readonly AgentDescriptor[];
  readonly rationale: string;
}

export interface SelectionStrategy {
  readonly name: string;
  /**
   * @throws {NoAgentAvailableError} if no pool member can be selected.
   */
  select(pool: readonly AgentDescriptor[], context: SelectionContext): Selection;
}

// ---------------------------------------------------------------------------
// History
// ---------------------------------------------------------------------------

export interface RoutingRecord {
  /** ISO 8601 */
  readonly timestamp: string;
  readonly problemType: string;
  readonly selectedAgent: string;
  readonly rationale: string;
}

export interface RoutingStats {
  readonly totalRouted: number;
  readonly byAgent: Readonly<Record<string, number>>;
  readonly byProblemType: Readonly<Record<string, number>>;
  readonly lastRouting: RoutingRecord | null;
}

export interface RoutingReport {
  /** ISO 8601 */
  readonly generatedAt: string;
  readonly stats: RoutingStats;
  /** Advisor's reading of the stats; null when there is no advisor or it failed. */
  readonly insights: string | null;
}
