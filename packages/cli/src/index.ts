/**
 * @tandem/cli: `tandem` status commands over the persisted state documents.
 */

export const PACKAGE_NAME = "@tandem/cli" as const;

export {
  type CliArgs,
  CliUsageError,
  type CommandName,
  COMMANDS,
  DEFAULT_STATE_DIR,
  HELP_TEXT,
  type OutputFormat,
  parseArgs,
} from "./args.js";
export { runCommand, STATE_FILES } from "./commands.js";
export { getReporter, JsonReporter, type StatusReporter, TextReporter } from "./reporters/index.js";
