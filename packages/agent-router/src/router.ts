import {
  type AgentDescriptor,
  adviseSafely,
  type Clock,
  DEFAULT_PROBLEM_TYPE,
  defaultClock,
  isoNow,
  JsonStateFile,
  type KnowledgeCollaborator,
  type LearningChannel,
  PERMANENT_TTL_DAYS,
  retainLast,
  SerialLock,
} from "@tandem/core";
import {
  AgentNotFoundError,
  NoAgentAvailableError,
  RouterConfigurationInvalidError,
} from "@tandem/errors";
import { getRoutingDecisions, withSpan } from "@tandem/telemetry";
import { buildTieBreakPrompt, parseAdvice } from "./advice.js";
import {
  computeRoutingStats,
  fromPersistedRoute,
  type RoutingHistoryDocument,
  routingHistoryDocumentSchema,
  toPersistedRoute,
} from "./history.js";
import { LeastLoadedStrategy } from "./strategies/least-loaded.js";
import { PreferLocalStrategy } from "./strategies/prefer-local.js";
import type {
  AgentRouterOptions,
  RoutingRecord,
  RoutingReport,
  RoutingStats,
  SelectOptions,
  Selection,
  SelectionStrategy,
} from "./types.js";
import { agentLoadSchema, resolveRouterConfig } from "./validation.js";

/**
 * Stateful problem router over a pool of agents:
 * - Least-loaded selection with registration-order tie-break
 * - Optional local-agent preference
 * - Advisor is consulted on load ties; its pick is recorded, never applied
 * - Routing history with stats, persistence and advisory report
 *
 * The pool is owned here and seeded from configuration; it is not persisted.
 * Load is updated only through `setLoad`.
 */
export class AgentRouter {
  private readonly pool: AgentDescriptor[];
  private readonly history: RoutingRecord[] = [];
  private readonly lock = new SerialLock();
  private readonly clock: Clock;
  private readonly retention: number;
  private readonly adviceTimeoutMs: number;
  private readonly advisor: Pick<KnowledgeCollaborator, "chat" | "query"> | undefined;
  private readonly learning: LearningChannel | undefined;
  private readonly stateFile: JsonStateFile<RoutingHistoryDocument> | null;
  private readonly leastLoaded: SelectionStrategy;
  private readonly preferLocal: SelectionStrategy;

  constructor(options: AgentRouterOptions) {
    const config = resolveRouterConfig(options);
    this.pool = [...config.agents];
    this.retention = config.retention;
    this.adviceTimeoutMs = config.adviceTimeoutMs;
    this.clock = options.clock ?? defaultClock;
    this.advisor = options.advisor;
    this.learning = options.learning;
    this.stateFile =
      options.statePath !== undefined
        ? new JsonStateFile(options.statePath, routingHistoryDocumentSchema)
        : null;
    this.leastLoaded = new LeastLoadedStrategy();
    this.preferLocal = new PreferLocalStrategy(config.localAgent);
  }

  /**
   * Create a router and load its persisted routing history.
   *
   * @throws {PersistenceError} if the state file is unreadable or malformed.
   */
  static async open(options: AgentRouterOptions): Promise<AgentRouter> {
    const router = new AgentRouter(options);
    const document = await router.stateFile?.read();
    if (document) {
      router.history.push(...document.routes.map(fromPersistedRoute));
    }
    return router;
  }

  // -------------------------------------------------------------------------
  // Pool maintenance
  // -------------------------------------------------------------------------

  /** Snapshot of the pool in registration order. */
  get agents(): readonly AgentDescriptor[] {
    return [...this.pool];
  }

  /** @throws {AgentNotFoundError} */
  setAvailability(name: string, available: boolean): void {
    const index = this.indexOf(name);
    const agent = this.pool[index];
    if (agent) this.pool[index] = { ...agent, available };
  }

  /**
   * @throws {AgentNotFoundError}
   * @throws {RouterConfigurationInvalidError} if load is not a non-negative integer.
   */
  setLoad(name: string, currentLoad: number): void {
    const index = this.indexOf(name);
    if (!agentLoadSchema.safeParse(currentLoad).success) {
      throw new RouterConfigurationInvalidError(
        `currentLoad must be a non-negative integer, got ${currentLoad}`,
      );
    }
    const agent = this.pool[index];
    if (agent) this.pool[index] = { ...agent, currentLoad };
  }

  // -------------------------------------------------------------------------
  // Selection
  // -------------------------------------------------------------------------

  /**
   * Pick the agent for a problem and record the decision.
   *
   * @throws {NoAgentAvailableError} if the pool is empty or every agent is unavailable.
   * @throws {PersistenceError} if the routing history cannot be written.
   */
  async selectAgent(
    problemType: string = DEFAULT_PROBLEM_TYPE,
    options: SelectOptions = {},
  ): Promise<string> {
    const preferLocal = options.preferLocal ?? false;
    return withSpan(
      "tandem.routing.select_agent",
      { "tandem.routing.problem_type": problemType, "tandem.routing.prefer_local": preferLocal },
      async (span) => {
        const snapshot = [...this.pool];
        const strategy = preferLocal ? this.preferLocal : this.leastLoaded;

        let selection: Selection;
        try {
          selection = strategy.select(snapshot, { problemType });
        } catch (error) {
          if (error instanceof NoAgentAvailableError) {
            await this.recordRecovery(error);
          }
          throw error;
        }

        const decision = preferLocal
          ? selection
          : await this.consultOnTie(selection, problemType, options.description);
        const record: RoutingRecord = {
          timestamp: isoNow(this.clock),
          problemType,
          selectedAgent: decision.agent.name,
          rationale: decision.rationale,
        };

        await this.lock.run(async () => {
          this.history.push(record);
          await this.persist();
        });

        getRoutingDecisions().add(1, {
          "tandem.routing.agent": record.selectedAgent,
          "tandem.routing.problem_type": problemType,
        });
        this.learning?.publish({
          query: `How do I route a ${problemType} problem to the best agent?`,
          response: `Route to ${record.selectedAgent} because: ${record.rationale}`,
          category: "routing_decision",
          ttlDays: PERMANENT_TTL_DAYS,
        });
        span.setAttribute("tandem.routing.agent", record.selectedAgent);
        return record.selectedAgent;
      },
    );
  }

  // -------------------------------------------------------------------------
  // History
  // -------------------------------------------------------------------------

  /** Routing records in append order. */
  get routes(): readonly RoutingRecord[] {
    return [...this.history];
  }

  getRoutingStats(): RoutingStats {
    return computeRoutingStats(this.history);
  }

  /** Stats plus the advisor's reading of them. */
  async generateReport(): Promise<RoutingReport> {
    const stats = this.getRoutingStats();
    const advisor = this.advisor;
    const insights = advisor
      ? await adviseSafely<string | null>(
          () =>
            advisor.query(`What patterns do you see in this routing data: ${JSON.stringify(stats)}?`),
          { timeoutMs: this.adviceTimeoutMs, fallback: null, label: "agent-router:query" },
        )
      : null;

    return {
      generatedAt: isoNow(this.clock),
      stats,
      insights: insights !== null && insights.trim() !== "" ? insights : null,
    };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private indexOf(name: string): number {
    const index = this.pool.findIndex((agent) => agent.name === name);
    if (index < 0) {
      throw new AgentNotFoundError(name);
    }
    return index;
  }

  /**
   * Ask the advisor about equally loaded candidates. The pool-order pick
   * stands; a valid suggestion is only noted in the rationale.
   */
  private async consultOnTie(
    selection: Selection,
    problemType: string,
    description: string | undefined,
  ): Promise<Selection> {
    const advisor = this.advisor;
    if (!advisor || selection.tied.length < 2) {
      return selection;
    }

    const reply = await adviseSafely(
      () => advisor.chat(buildTieBreakPrompt(problemType, description, selection.tied)),
      { timeoutMs: this.adviceTimeoutMs, fallback: "", label: "agent-router:chat" },
    );
    const advised = parseAdvice(reply, selection.tied);
    if (!advised) {
      return selection;
    }

    return {
      ...selection,
      rationale: `${selection.rationale}; advisor suggested '${advised.name}'`,
    };
  }

  private async recordRecovery(error: NoAgentAvailableError): Promise<void> {
    const advisor = this.advisor;
    const learning = this.learning;
    if (!advisor || !learning) return;

    const guidance = await adviseSafely(
      () => advisor.query(`How do I fix routing error: ${error.name}?`),
      { timeoutMs: this.adviceTimeoutMs, fallback: "", label: "agent-router:query" },
    );
    if (guidance.trim() === "") return;

    learning.publish({
      query: `How to fix routing error: ${error.name}`,
      response: guidance,
      category: "error_recovery",
      ttlDays: PERMANENT_TTL_DAYS,
    });
  }

  private async persist(): Promise<void> {
    if (this.stateFile === null) return;
    await this.stateFile.write({
      last_updated: isoNow(this.clock),
      total_routed: this.history.length,
      routes: retainLast(this.history, this.retention).map(toPersistedRoute),
    });
  }
}
