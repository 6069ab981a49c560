import type { AgentDescriptor } from "@tandem/core";
import { NoAgentAvailableError } from "@tandem/errors";
import type { Selection, SelectionContext, SelectionStrategy } from "../types.js";

/**
 * Prefer-local strategy: the configured local agent when it is available,
 * otherwise the first available agent in pool order. Load is not consulted.
 */
export class PreferLocalStrategy implements SelectionStrategy {
  readonly name = "prefer-local";
  private readonly localAgent: string | undefined;

  constructor(localAgent?: string) {
    this.localAgent = localAgent;
  }

  select(pool: readonly AgentDescriptor[], context: SelectionContext): Selection {
    const local = pool.find((agent) => agent.name === this.localAgent);
    if (local?.available) {
      return { agent: local, tied: [local], rationale: `Local agent '${local.name}' is available` };
    }

    const fallback = pool.find((agent) => agent.available);
    if (!fallback) {
      throw new NoAgentAvailableError(context.problemType, pool.length);
    }

    const reason =
      this.localAgent === undefined
        ? "No local agent configured"
        : `Local agent '${this.localAgent}' is unavailable`;
    return {
      agent: fallback,
      tied: [fallback],
      rationale: `${reason}; first available agent in pool order`,
    };
  }
}
