import { isRepoId, type RepoId } from "@tandem/core";

// ---------------------------------------------------------------------------
// Argument parsing (minimal, no external CLI lib)
// ---------------------------------------------------------------------------

export const COMMANDS = ["sync-stats", "routing-stats", "knowledge-summary", "help"] as const;
export type CommandName = (typeof COMMANDS)[number];

export type OutputFormat = "text" | "json";

export const DEFAULT_STATE_DIR = ".tandem";

export interface CliArgs {
  readonly command: CommandName;
  readonly stateDir: string;
  readonly format: OutputFormat;
  /** Exchange document for `knowledge-summary`. */
  readonly file?: string;
  /** Repository the exchange document came from. Default: "A" */
  readonly origin: RepoId;
}

/** Bad command line. The CLI prints usage and exits with 2. */
export class CliUsageError extends Error {
  override readonly name = "CliUsageError";
}

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("--")) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

/**
 * Parse `process.argv`-shaped input (runtime and script first).
 *
 * @throws {CliUsageError}
 */
export function parseArgs(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): CliArgs {
  let command: CommandName | undefined;
  let stateDir = env.TANDEM_STATE_DIR || DEFAULT_STATE_DIR;
  let format: OutputFormat = "text";
  let file: string | undefined;
  let origin: RepoId = "A";

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    switch (arg) {
      case "--state-dir":
        stateDir = requireValue(arg, next);
        i++;
        break;
      case "--format":
        if (next !== "text" && next !== "json") {
          throw new CliUsageError(`--format must be text or json, got '${next ?? ""}'`);
        }
        format = next;
        i++;
        break;
      case "--file":
        file = requireValue(arg, next);
        i++;
        break;
      case "--origin":
        if (!isRepoId(next)) {
          throw new CliUsageError(`--origin must be A or B, got '${next ?? ""}'`);
        }
        origin = next;
        i++;
        break;
      case "--help":
        command = "help";
        break;
      case undefined:
        break;
      default:
        if (arg.startsWith("--")) {
          throw new CliUsageError(`Unknown option '${arg}'`);
        }
        if (command !== undefined) {
          throw new CliUsageError(`Unexpected argument '${arg}'`);
        }
        if (!isCommandName(arg)) {
          throw new CliUsageError(`Unknown command '${arg}'`);
        }
        command = arg;
    }
  }

  const resolved = command ?? "help";
  if (resolved === "knowledge-summary" && file === undefined) {
    throw new CliUsageError("knowledge-summary requires --file <export.json>");
  }

  return {
    command: resolved,
    stateDir,
    format,
    origin,
    ...(file !== undefined ? { file } : {}),
  };
}

export const HELP_TEXT = `
tandem: status of knowledge federation and agent routing

Usage: tandem <command> [options]

Commands:
  sync-stats               Sync ledger totals per direction
  routing-stats            Routing history totals per agent and problem type
  knowledge-summary        Summarize a knowledge exchange document
  help                     Show this help message

Options:
  --state-dir <dir>        State directory (default: $TANDEM_STATE_DIR or .tandem)
  --format text|json       Output format (default: text)
  --file <export.json>     Exchange document for knowledge-summary
  --origin A|B             Repository the document came from (default: A)
  --help                   Show this help message
`;
