import * as path from "node:path";
import { AgentRouter } from "@tandem/agent-router";
import { readKnowledgeDocument, summarizeKnowledge, SyncLedger } from "@tandem/federation";
import { type CliArgs, CliUsageError, HELP_TEXT } from "./args.js";
import { getReporter } from "./reporters/index.js";

/** File names of the state documents inside the state directory. */
export const STATE_FILES = {
  syncLedger: "sync-ledger.json",
  routing: "routing.json",
} as const;

/**
 * Run one command and return its rendered output. Missing state files read
 * as empty histories.
 *
 * @throws {PersistenceError} if a state or exchange document is unreadable.
 */
export async function runCommand(args: CliArgs): Promise<string> {
  const reporter = getReporter(args.format);

  switch (args.command) {
    case "sync-stats": {
      const ledger = await SyncLedger.open({
        statePath: path.join(args.stateDir, STATE_FILES.syncLedger),
      });
      return reporter.syncStats(ledger.getSyncStats());
    }
    case "routing-stats": {
      // The pool is not persisted; only the history is needed here.
      const router = await AgentRouter.open({
        agents: [],
        statePath: path.join(args.stateDir, STATE_FILES.routing),
      });
      return reporter.routingStats(router.getRoutingStats());
    }
    case "knowledge-summary": {
      if (args.file === undefined) {
        throw new CliUsageError("knowledge-summary requires --file <export.json>");
      }
      const { entries, malformed } = await readKnowledgeDocument(args.file, args.origin);
      return reporter.knowledgeSummary(summarizeKnowledge(entries), malformed);
    }
    case "help":
      return HELP_TEXT;
  }
}
