import { DEFAULT_RETENTION } from "@tandem/core";
import { OrchestrationConfigurationInvalidError } from "@tandem/errors";
import { z } from "zod";
import type { OrchestratorConfig } from "./types.js";

export const DEFAULT_ORCHESTRATOR_CONFIG: Required<OrchestratorConfig> = {
  retention: DEFAULT_RETENTION,
};

const orchestratorConfigSchema = z.object({
  retention: z
    .number()
    .int({ message: "retention must be a positive integer" })
    .positive({ message: "retention must be a positive integer" }),
});

/**
 * Merge overrides with defaults and validate.
 *
 * @throws {OrchestrationConfigurationInvalidError} if a value is out of range.
 */
export function resolveOrchestratorConfig(
  overrides?: OrchestratorConfig,
): Required<OrchestratorConfig> {
  const result = orchestratorConfigSchema.safeParse({
    ...DEFAULT_ORCHESTRATOR_CONFIG,
    ...(overrides?.retention !== undefined ? { retention: overrides.retention } : {}),
  });
  if (!result.success) {
    throw new OrchestrationConfigurationInvalidError(
      result.error.issues.map((issue) => issue.message).join("; "),
    );
  }
  return result.data;
}
