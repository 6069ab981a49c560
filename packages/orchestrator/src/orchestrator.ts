import type { AgentRouter } from "@tandem/agent-router";
import {
  type Clock,
  DEFAULT_PROBLEM_TYPE,
  defaultClock,
  isoNow,
  JsonStateFile,
  logWarn,
  retainLast,
  SerialLock,
} from "@tandem/core";
import { getErrorMessage, RoutingError } from "@tandem/errors";
import { getSolutions, withSpan } from "@tandem/telemetry";
import { resolveOrchestratorConfig } from "./config.js";
import {
  fromPersistedSolution,
  type SolutionLogDocument,
  solutionLogDocumentSchema,
  toPersistedRouterStats,
  toPersistedSolution,
} from "./schema.js";
import type {
  OrchestrationReport,
  OrchestrationStats,
  OrchestratorOptions,
  SolutionRecord,
} from "./types.js";

/**
 * Routes problems through the AgentRouter and keeps the solution log.
 *
 * Holds the router by composition; its own lock guards only the solution
 * log, never the routing call.
 */
export class Orchestrator {
  private readonly router: AgentRouter;
  private readonly solutions: SolutionRecord[] = [];
  private readonly lock = new SerialLock();
  private readonly clock: Clock;
  private readonly retention: number;
  private readonly stateFile: JsonStateFile<SolutionLogDocument> | null;

  constructor(options: OrchestratorOptions) {
    this.router = options.router;
    this.clock = options.clock ?? defaultClock;
    this.retention = resolveOrchestratorConfig(options).retention;
    this.stateFile =
      options.statePath !== undefined
        ? new JsonStateFile(options.statePath, solutionLogDocumentSchema)
        : null;
  }

  /**
   * Create an orchestrator and load its persisted solution log.
   *
   * @throws {PersistenceError} if the state file is unreadable or malformed.
   */
  static async open(options: OrchestratorOptions): Promise<Orchestrator> {
    const orchestrator = new Orchestrator(options);
    const document = await orchestrator.stateFile?.read();
    if (document) {
      orchestrator.solutions.push(...document.solutions.map(fromPersistedSolution));
    }
    return orchestrator;
  }

  /** Solution records in append order. */
  get history(): readonly SolutionRecord[] {
    return [...this.solutions];
  }

  /**
   * Route a problem and record the outcome.
   *
   * When routing fails a FAILED record is appended and persisted before the
   * router's error is rethrown.
   *
   * @throws {NoAgentAvailableError} if no agent can take the problem.
   * @throws {PersistenceError} if the solution log cannot be written.
   */
  async solve(
    problem: string,
    problemType: string = DEFAULT_PROBLEM_TYPE,
  ): Promise<SolutionRecord> {
    return withSpan(
      "tandem.orchestrator.solve",
      { "tandem.solve.problem_type": problemType },
      async (span) => {
        let solvedBy: string;
        try {
          solvedBy = await this.router.selectAgent(problemType, {
            preferLocal: false,
            description: problem,
          });
        } catch (error) {
          if (error instanceof RoutingError) {
            await this.recordFailure(problem, problemType);
          }
          throw error;
        }

        const record: SolutionRecord = {
          timestamp: isoNow(this.clock),
          problem,
          problemType,
          solvedBy,
          status: "SOLVED",
        };
        await this.append(record);
        span.setAttribute("tandem.solve.agent", solvedBy);
        return record;
      },
    );
  }

  getOrchestrationStats(): OrchestrationStats {
    const totalSolutions = this.solutions.length;
    const totalSolved = this.solutions.filter((record) => record.status === "SOLVED").length;
    return {
      totalSolutions,
      totalSolved,
      successRate: totalSolutions > 0 ? totalSolved / totalSolutions : 0,
      routingStats: this.router.getRoutingStats(),
      lastSolution: this.solutions.at(-1) ?? null,
    };
  }

  /** Solution stats plus the router's advisory report. */
  async generateReport(): Promise<OrchestrationReport> {
    return {
      generatedAt: isoNow(this.clock),
      stats: this.getOrchestrationStats(),
      routing: await this.router.generateReport(),
    };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /**
   * Record a routing failure. A write failure here is logged so that the
   * routing error stays the one the caller sees.
   */
  private async recordFailure(problem: string, problemType: string): Promise<void> {
    const record: SolutionRecord = {
      timestamp: isoNow(this.clock),
      problem,
      problemType,
      solvedBy: null,
      status: "FAILED",
    };
    try {
      await this.append(record);
    } catch (error) {
      logWarn("orchestrator", `Could not persist FAILED record: ${getErrorMessage(error)}`);
    }
  }

  private async append(record: SolutionRecord): Promise<void> {
    await this.lock.run(async () => {
      this.solutions.push(record);
      getSolutions().add(1, { "tandem.solve.status": record.status });
      await this.persist();
    });
  }

  private async persist(): Promise<void> {
    if (this.stateFile === null) return;
    await this.stateFile.write({
      last_updated: isoNow(this.clock),
      total_solutions: this.solutions.length,
      router_stats: toPersistedRouterStats(this.router.getRoutingStats()),
      solutions: retainLast(this.solutions, this.retention).map(toPersistedSolution),
    });
  }
}
