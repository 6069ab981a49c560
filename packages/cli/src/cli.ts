#!/usr/bin/env node

import { getErrorMessage } from "@tandem/errors";
import { setupTelemetry, shutdownTelemetry } from "@tandem/telemetry";
import { CliUsageError, HELP_TEXT, parseArgs } from "./args.js";
import { runCommand } from "./commands.js";

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  let args: ReturnType<typeof parseArgs>;
  try {
    args = parseArgs(process.argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`Error: ${error.message}`);
      console.error(HELP_TEXT);
      process.exit(2);
    }
    throw error;
  }

  const tracing = await setupTelemetry();
  try {
    console.log(await runCommand(args));
  } finally {
    if (tracing) {
      await shutdownTelemetry();
    }
  }
}

main().catch((err: unknown) => {
  console.error("Fatal:", getErrorMessage(err));
  process.exit(1);
});
