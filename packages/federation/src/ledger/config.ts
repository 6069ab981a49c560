/**
 * Sync ledger configuration resolution.
 *
 * Merges user-provided overrides with defaults and validates constraints.
 */

import { DEFAULT_RETENTION } from "@tandem/core";
import { FederationConfigurationInvalidError } from "@tandem/errors";
import { z } from "zod";
import type { SyncLedgerConfig } from "./types.js";

export const DEFAULT_SYNC_LEDGER_CONFIG: Required<SyncLedgerConfig> = {
  retention: DEFAULT_RETENTION,
};

const syncLedgerConfigSchema = z.object({
  retention: z
    .number()
    .int({ message: "retention must be a positive integer" })
    .positive({ message: "retention must be a positive integer" }),
});

/**
 * Resolve ledger config by merging user overrides with defaults.
 *
 * @throws {FederationConfigurationInvalidError} if any value is out of range.
 */
export function resolveLedgerConfig(overrides?: SyncLedgerConfig): Required<SyncLedgerConfig> {
  const result = syncLedgerConfigSchema.safeParse({
    ...DEFAULT_SYNC_LEDGER_CONFIG,
    ...(overrides?.retention !== undefined ? { retention: overrides.retention } : {}),
  });
  if (!result.success) {
    throw new FederationConfigurationInvalidError(
      result.error.issues.map((issue) => issue.message).join("; "),
    );
  }
  return result.data;
}
