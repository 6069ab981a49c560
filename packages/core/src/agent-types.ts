/**
 * Agent pool types.
 */

/** A solving entity a problem can be routed to. */
export interface AgentDescriptor {
  readonly name: string;
  readonly available: boolean;
  /** Non-negative integer. */
  readonly currentLoad: number;
}

/** Problem type used when a caller does not name one. */
export const DEFAULT_PROBLEM_TYPE = "general";
