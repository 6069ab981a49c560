import * as fs from "node:fs/promises";
import * as path from "node:path";
import { LearningChannel } from "@tandem/core";
import { AgentNotFoundError, NoAgentAvailableError, PersistenceError } from "@tandem/errors";
import {
  createMockCollaborator,
  createTempDir,
  FakeClock,
  type MockCollaborator,
  removeTempDir,
} from "@tandem/test-utils";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AgentRouter } from "../router.js";

describe("AgentRouter", () => {
  let clock: FakeClock;
  let tmpDir: string;

  beforeEach(async () => {
    clock = new FakeClock();
    tmpDir = await createTempDir("agent-router-test-");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(tmpDir);
  });

  // -------------------------------------------------------------------------
  // Least-loaded selection
  // -------------------------------------------------------------------------

  describe("selectAgent (least loaded)", () => {
    it("returns the least loaded agent, repeatedly for a fixed pool", async () => {
      const router = new AgentRouter({
        clock,
        agents: [
          { name: "a", currentLoad: 3 },
          { name: "b", currentLoad: 1 },
        ],
      });

      expect(await router.selectAgent("code")).toBe("b");
      expect(await router.selectAgent("code")).toBe("b");
    });

    it("returns the first registered agent when loads are equal", async () => {
      const router = new AgentRouter({
        clock,
        agents: [{ name: "a" }, { name: "b" }, { name: "c" }],
      });

      const picks = [
        await router.selectAgent("code"),
        await router.selectAgent("docs"),
        await router.selectAgent("code"),
      ];
      expect(picks).toEqual(["a", "a", "a"]);
    });

    it("fails with NoAgentAvailableError on an empty pool", async () => {
      const router = new AgentRouter({ clock, agents: [] });

      await expect(router.selectAgent("code")).rejects.toThrow(NoAgentAvailableError);
      expect(router.getRoutingStats().totalRouted).toBe(0);
    });

    it("fails when every agent is unavailable", async () => {
      const router = new AgentRouter({
        clock,
        agents: [
          { name: "a", available: false },
          { name: "b", available: false },
        ],
      });

      await expect(router.selectAgent("code")).rejects.toThrow(
        "No agent available for 'code': all 2 agents are unavailable",
      );
    });

    it("uses the general problem type by default", async () => {
      const router = new AgentRouter({ clock, agents: [{ name: "a" }] });

      await router.selectAgent();

      expect(router.routes[0]?.problemType).toBe("general");
    });
  });

  // -------------------------------------------------------------------------
  // Prefer local
  // -------------------------------------------------------------------------

  describe("selectAgent (prefer local)", () => {
    it("returns the local agent when available", async () => {
      const router = new AgentRouter({
        clock,
        localAgent: "b",
        agents: [{ name: "a" }, { name: "b", currentLoad: 8 }],
      });

      expect(await router.selectAgent("code", { preferLocal: true })).toBe("b");
    });

    it("falls back to the first available agent when the local one is down", async () => {
      const router = new AgentRouter({
        clock,
        localAgent: "a",
        agents: [{ name: "a", available: false }, { name: "b", currentLoad: 4 }, { name: "c" }],
      });

      expect(await router.selectAgent("code", { preferLocal: true })).toBe("b");
    });

    it("never asks the advisor", async () => {
      const advisor = createMockCollaborator();
      const router = new AgentRouter({
        clock,
        advisor,
        localAgent: "a",
        agents: [{ name: "a" }, { name: "b" }],
      });

      await router.selectAgent("code", { preferLocal: true });

      expect(advisor.chat).not.toHaveBeenCalled();
    });
  });

  // -------------------------------------------------------------------------
  // Advisor on ties
  // -------------------------------------------------------------------------

  describe("advisor", () => {
    let advisor: MockCollaborator;

    beforeEach(() => {
      advisor = createMockCollaborator();
    });

    it("records the advisor's pick on a tie but keeps pool order", async () => {
      advisor.chat.mockResolvedValue("c");
      const router = new AgentRouter({
        clock,
        advisor,
        agents: [{ name: "a", currentLoad: 2 }, { name: "b" }, { name: "c" }],
      });

      expect(await router.selectAgent("code", { description: "flaky test" })).toBe("b");
      expect(advisor.chat).toHaveBeenCalledWith(
        [
          "Problem type: code",
          "Description: flaky test",
          "Candidates: b, c",
          "Reply with exactly one candidate name and nothing else.",
        ].join("\n"),
      );
      expect(router.routes[0]?.rationale).toBe(
        "Least loaded available agent (load 0); tie among 2 broken by pool order; advisor suggested 'c'",
      );
    });

    it("selects the same agent for the same pool whatever the advisor replies", async () => {
      advisor.chat.mockResolvedValueOnce("b").mockResolvedValueOnce("a");
      const router = new AgentRouter({ clock, advisor, agents: [{ name: "a" }, { name: "b" }] });

      const picks = [await router.selectAgent("code"), await router.selectAgent("code")];

      expect(picks).toEqual(["a", "a"]);
      expect(router.routes.map((route) => route.rationale)).toEqual([
        "Least loaded available agent (load 0); tie among 2 broken by pool order; advisor suggested 'b'",
        "Least loaded available agent (load 0); tie among 2 broken by pool order; advisor suggested 'a'",
      ]);
    });

    it("cannot override load", async () => {
      advisor.chat.mockResolvedValue("a");
      const router = new AgentRouter({
        clock,
        advisor,
        agents: [{ name: "a", currentLoad: 2 }, { name: "b" }, { name: "c" }],
      });

      expect(await router.selectAgent("code")).toBe("b");
    });

    it("is not consulted without a tie", async () => {
      const router = new AgentRouter({
        clock,
        advisor,
        agents: [{ name: "a", currentLoad: 2 }, { name: "b" }],
      });

      await router.selectAgent("code");

      expect(advisor.chat).not.toHaveBeenCalled();
    });

    it("ignores free-text replies", async () => {
      advisor.chat.mockResolvedValue("Route it to c, it is faster.");
      const router = new AgentRouter({ clock, advisor, agents: [{ name: "b" }, { name: "c" }] });

      expect(await router.selectAgent("code")).toBe("b");
    });

    it("falls back to pool order when the advisor fails", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      advisor.chat.mockRejectedValue(new Error("chat offline"));
      const router = new AgentRouter({ clock, advisor, agents: [{ name: "b" }, { name: "c" }] });

      expect(await router.selectAgent("code")).toBe("b");
      expect(warn).toHaveBeenCalledWith("[agent-router:chat] Call failed: chat offline");
    });

    it("falls back to pool order when the advisor does not answer in time", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      advisor.chat.mockReturnValue(new Promise<string>(() => {}));
      const router = new AgentRouter({
        clock,
        advisor,
        adviceTimeoutMs: 20,
        agents: [{ name: "b" }, { name: "c" }],
      });

      expect(await router.selectAgent("code")).toBe("b");
      expect(warn).toHaveBeenCalledWith("[agent-router:chat] Call timed out after 20ms");
    });
  });

  // -------------------------------------------------------------------------
  // Learning records
  // -------------------------------------------------------------------------

  describe("learning", () => {
    it("publishes one routing decision per selection", async () => {
      const sink = createMockCollaborator();
      const learning = new LearningChannel(sink);
      const router = new AgentRouter({ clock, learning, agents: [{ name: "a" }] });

      await router.selectAgent("code");
      await learning.flush();

      expect(sink.store).toHaveBeenCalledWith({
        query: "How do I route a code problem to the best agent?",
        response: "Route to a because: Least loaded available agent (load 0)",
        category: "routing_decision",
        ttlDays: 36_500,
      });
    });

    it("keeps recovery advice when routing fails", async () => {
      const sink = createMockCollaborator();
      const advisor = createMockCollaborator();
      advisor.query.mockResolvedValue("Bring an agent back online.");
      const learning = new LearningChannel(sink);
      const router = new AgentRouter({ clock, learning, advisor, agents: [] });

      await expect(router.selectAgent("code")).rejects.toThrow(NoAgentAvailableError);
      await learning.flush();

      expect(advisor.query).toHaveBeenCalledWith(
        "How do I fix routing error: NoAgentAvailableError?",
      );
      expect(sink.store).toHaveBeenCalledWith({
        query: "How to fix routing error: NoAgentAvailableError",
        response: "Bring an agent back online.",
        category: "error_recovery",
        ttlDays: 36_500,
      });
    });
  });

  // -------------------------------------------------------------------------
  // Pool maintenance
  // -------------------------------------------------------------------------

  describe("pool maintenance", () => {
    it("applies load and availability changes to later selections", async () => {
      const router = new AgentRouter({ clock, agents: [{ name: "a" }, { name: "b" }] });

      router.setLoad("a", 5);
      expect(await router.selectAgent("code")).toBe("b");

      router.setAvailability("b", false);
      expect(await router.selectAgent("code")).toBe("a");
      expect(router.agents).toEqual([
        { name: "a", available: true, currentLoad: 5 },
        { name: "b", available: false, currentLoad: 0 },
      ]);
    });

    it("does not change load on selection", async () => {
      const router = new AgentRouter({ clock, agents: [{ name: "a", currentLoad: 1 }] });

      await router.selectAgent("code");

      expect(router.agents[0]?.currentLoad).toBe(1);
    });

    it("rejects unknown agents", () => {
      const router = new AgentRouter({ clock, agents: [{ name: "a" }] });

      expect(() => router.setLoad("z", 1)).toThrow(AgentNotFoundError);
      expect(() => router.setAvailability("z", true)).toThrow("Agent 'z' is not part of the pool");
    });

    it("rejects a negative load", () => {
      const router = new AgentRouter({ clock, agents: [{ name: "a" }] });

      expect(() => router.setLoad("a", -2)).toThrow(
        "Invalid router configuration: currentLoad must be a non-negative integer, got -2",
      );
    });
  });

  // -------------------------------------------------------------------------
  // Stats, report and persistence
  // -------------------------------------------------------------------------

  describe("history", () => {
    it("reports empty stats before any routing", () => {
      const router = new AgentRouter({ clock, agents: [{ name: "a" }] });

      expect(router.getRoutingStats()).toEqual({
        totalRouted: 0,
        byAgent: {},
        byProblemType: {},
        lastRouting: null,
      });
    });

    it("counts by agent and problem type", async () => {
      const router = new AgentRouter({ clock, agents: [{ name: "a" }, { name: "b" }] });

      await router.selectAgent("code");
      router.setLoad("a", 1);
      await router.selectAgent("docs");
      await router.selectAgent("code");

      const stats = router.getRoutingStats();
      expect(stats.totalRouted).toBe(3);
      expect(stats.byAgent).toEqual({ a: 1, b: 2 });
      expect(stats.byProblemType).toEqual({ code: 2, docs: 1 });
      expect(stats.lastRouting).toEqual({
        timestamp: "2026-01-01T00:00:00.000Z",
        problemType: "code",
        selectedAgent: "b",
        rationale: "Least loaded available agent (load 0)",
      });
    });

    it("persists and restores the routing history", async () => {
      const statePath = path.join(tmpDir, "routing.json");
      const router = new AgentRouter({ clock, statePath, agents: [{ name: "a" }] });
      await router.selectAgent("code");

      const document: unknown = JSON.parse(await fs.readFile(statePath, "utf-8"));
      expect(document).toEqual({
        last_updated: "2026-01-01T00:00:00.000Z",
        total_routed: 1,
        routes: [
          {
            timestamp: "2026-01-01T00:00:00.000Z",
            problem_type: "code",
            selected_agent: "a",
            rationale: "Least loaded available agent (load 0)",
          },
        ],
      });

      const reopened = await AgentRouter.open({ clock, statePath, agents: [{ name: "a" }] });
      expect(reopened.getRoutingStats().totalRouted).toBe(1);
    });

    it("keeps only the most recent routes in the document", async () => {
      const statePath = path.join(tmpDir, "routing.json");
      const router = new AgentRouter({ clock, statePath, retention: 1, agents: [{ name: "a" }] });

      await router.selectAgent("first");
      await router.selectAgent("second");

      const document: { total_routed: number; routes: { problem_type: string }[] } = JSON.parse(
        await fs.readFile(statePath, "utf-8"),
      );
      expect(document.total_routed).toBe(2);
      expect(document.routes.map((r) => r.problem_type)).toEqual(["second"]);
    });

    it("surfaces a failed history write", async () => {
      vi.spyOn(console, "warn").mockImplementation(() => {});
      await fs.writeFile(path.join(tmpDir, "blocker"), "not a directory");
      const router = new AgentRouter({
        clock,
        statePath: path.join(tmpDir, "blocker", "routing.json"),
        agents: [{ name: "a" }],
      });

      await expect(router.selectAgent("code")).rejects.toThrow(PersistenceError);
    });

    it("includes advisor insights in the report", async () => {
      const advisor = createMockCollaborator();
      advisor.query.mockResolvedValue("Agent a takes everything.");
      const router = new AgentRouter({ clock, advisor, agents: [{ name: "a" }] });
      await router.selectAgent("code");

      const report = await router.generateReport();

      expect(report.generatedAt).toBe("2026-01-01T00:00:00.000Z");
      expect(report.stats.totalRouted).toBe(1);
      expect(report.insights).toBe("Agent a takes everything.");
      expect(advisor.query).toHaveBeenCalledWith(
        `What patterns do you see in this routing data: ${JSON.stringify(report.stats)}?`,
      );
    });

    it("reports null insights without an advisor", async () => {
      const router = new AgentRouter({ clock, agents: [{ name: "a" }] });

      expect((await router.generateReport()).insights).toBeNull();
    });

    it("reports null insights when the advisor fails", async () => {
      vi.spyOn(console, "warn").mockImplementation(() => {});
      const advisor = createMockCollaborator();
      advisor.query.mockRejectedValue(new Error("down"));
      const router = new AgentRouter({ clock, advisor, agents: [{ name: "a" }] });

      expect((await router.generateReport()).insights).toBeNull();
    });
  });
});
