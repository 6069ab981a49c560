/**
 * @tandem/orchestrator: routes problems and keeps the solution log.
 */

export const PACKAGE_NAME = "@tandem/orchestrator" as const;

export { DEFAULT_ORCHESTRATOR_CONFIG, resolveOrchestratorConfig } from "./config.js";
export { Orchestrator } from "./orchestrator.js";
export { type SolutionLogDocument, solutionLogDocumentSchema } from "./schema.js";
export type {
  OrchestrationReport,
  OrchestrationStats,
  OrchestratorConfig,
  OrchestratorOptions,
  SolutionRecord,
  SolutionStatus,
} from "./types.js";
