import type { AgentDescriptor } from "@tandem/core";
import { NoAgentAvailableError } from "@tandem/errors";
import type { Selection, SelectionContext, SelectionStrategy } from "../types.js";

/**
 * Least-loaded strategy: the available agent with the lowest `currentLoad`.
 * Equal loads resolve to the earliest registered agent.
 * This is the default strategy.
 */
export class LeastLoadedStrategy implements SelectionStrategy {
  readonly name = "least-loaded";

  select(pool: readonly AgentDescriptor[], context: SelectionContext): Selection {
    const available = pool.filter((agent) => agent.available);
    const first = available[0];
    if (!first) {
      throw new NoAgentAvailableError(context.problemType, pool.length);
    }

    const minLoad = available.reduce(
      (min, agent) => Math.min(min, agent.currentLoad),
      first.currentLoad,
    );
    const tied = available.filter((agent) => agent.currentLoad === minLoad);
    const [agent = first] = tied;

    return {
      agent,
      tied,
      rationale:
        tied.length > 1
          ? `Least loaded available agent (load ${minLoad}); tie among ${tied.length} broken by pool order`
          : `Least loaded available agent (load ${minLoad})`,
    };
  }
}
