import { DEFAULT_ADVISORY_TIMEOUT_MS, DEFAULT_RETENTION } from "@tandem/core";
import { RouterConfigurationInvalidError } from "@tandem/errors";
import { z } from "zod";
import type { AgentRouterConfig, ResolvedAgentRouterConfig } from "./types.js";

export const agentLoadSchema = z
  .number()
  .int({ message: "currentLoad must be a non-negative integer" })
  .nonnegative({ message: "currentLoad must be a non-negative integer" });

const AgentConfigSchema = z.object({
  name: z.string().min(1, "Agent name must not be empty"),
  available: z.boolean().default(true),
  currentLoad: agentLoadSchema.default(0),
});

const AgentRouterConfigSchema = z
  .object({
    agents: z.array(AgentConfigSchema),
    localAgent: z.string().min(1, "localAgent must not be empty").optional(),
    retention: z
      .number()
      .int({ message: "retention must be a positive integer" })
      .positive({ message: "retention must be a positive integer" })
      .default(DEFAULT_RETENTION),
    adviceTimeoutMs: z
      .number()
      .positive({ message: "adviceTimeoutMs must be positive" })
      .default(DEFAULT_ADVISORY_TIMEOUT_MS),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    for (const agent of config.agents) {
      if (seen.has(agent.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Agent name '${agent.name}' is registered twice`,
          path: ["agents"],
        });
      }
      seen.add(agent.name);
    }

    if (config.localAgent !== undefined && !seen.has(config.localAgent)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `localAgent '${config.localAgent}' is not part of the pool`,
        path: ["localAgent"],
      });
    }
  });

/**
 * Validate a router config and fill in defaults.
 *
 * @throws {RouterConfigurationInvalidError} listing every problem found.
 */
export function resolveRouterConfig(config: AgentRouterConfig): ResolvedAgentRouterConfig {
  const result = AgentRouterConfigSchema.safeParse({
    agents: config.agents,
    ...(config.localAgent !== undefined ? { localAgent: config.localAgent } : {}),
    ...(config.retention !== undefined ? { retention: config.retention } : {}),
    ...(config.adviceTimeoutMs !== undefined ? { adviceTimeoutMs: config.adviceTimeoutMs } : {}),
  });
  if (!result.success) {
    throw new RouterConfigurationInvalidError(
      result.error.issues.map((issue) => issue.message).join("; "),
    );
  }
  return {
    agents: result.data.agents,
    localAgent: result.data.localAgent,
    retention: result.data.retention,
    adviceTimeoutMs: result.data.adviceTimeoutMs,
  };
}
