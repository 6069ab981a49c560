/**
 * @tandem/agent-router: assigns incoming problems to agents and keeps the
 * routing history.
 */

export const PACKAGE_NAME = "@tandem/agent-router" as const;

export { buildTieBreakPrompt, parseAdvice } from "./advice.js";
export {
  computeRoutingStats,
  fromPersistedRoute,
  type PersistedRoutingRecord,
  persistedRoutingRecordSchema,
  type RoutingHistoryDocument,
  routingHistoryDocumentSchema,
  toPersistedRoute,
} from "./history.js";
export { AgentRouter } from "./router.js";
export { LeastLoadedStrategy, PreferLocalStrategy } from "./strategies/index.js";
export type {
  AgentConfig,
  AgentRouterConfig,
  AgentRouterOptions,
  ResolvedAgentRouterConfig,
  RoutingRecord,
  RoutingReport,
  RoutingStats,
  Selection,
  SelectionContext,
  SelectionStrategy,
  SelectOptions,
} from "./types.js";
export { resolveRouterConfig } from "./validation.js";
