import type { AgentDescriptor } from "@tandem/core";
import { NoAgentAvailableError } from "@tandem/errors";
import { describe, expect, it } from "vitest";
import { buildTieBreakPrompt, parseAdvice } from "../advice.js";
import { LeastLoadedStrategy } from "../strategies/least-loaded.js";
import { PreferLocalStrategy } from "../strategies/prefer-local.js";

function agent(name: string, currentLoad: number, available = true): AgentDescriptor {
  return { name, available, currentLoad };
}

const context = { problemType: "code" };

describe("LeastLoadedStrategy", () => {
  const strategy = new LeastLoadedStrategy();

  it("returns the minimum-load available agent", () => {
    const selection = strategy.select([agent("a", 3), agent("b", 1), agent("c", 2)], context);

    expect(selection.agent.name).toBe("b");
    expect(selection.tied.map((a) => a.name)).toEqual(["b"]);
    expect(selection.rationale).toBe("Least loaded available agent (load 1)");
  });

  it("breaks ties by registration order", () => {
    const selection = strategy.select([agent("a", 0), agent("b", 0), agent("c", 0)], context);

    expect(selection.agent.name).toBe("a");
    expect(selection.tied.map((a) => a.name)).toEqual(["a", "b", "c"]);
    expect(selection.rationale).toBe(
      "Least loaded available agent (load 0); tie among 3 broken by pool order",
    );
  });

  it("ignores unavailable agents even when they are idle", () => {
    const selection = strategy.select([agent("a", 0, false), agent("b", 5)], context);

    expect(selection.agent.name).toBe("b");
  });

  it("throws when the pool is empty", () => {
    expect(() => strategy.select([], context)).toThrow(
      "No agent available for 'code': the agent pool is empty",
    );
  });

  it("throws when every agent is unavailable", () => {
    expect(() => strategy.select([agent("a", 0, false), agent("b", 0, false)], context)).toThrow(
      NoAgentAvailableError,
    );
  });
});

describe("PreferLocalStrategy", () => {
  it("returns the local agent when it is available, whatever its load", () => {
    const strategy = new PreferLocalStrategy("b");

    const selection = strategy.select([agent("a", 0), agent("b", 9)], context);

    expect(selection.agent.name).toBe("b");
    expect(selection.rationale).toBe("Local agent 'b' is available");
  });

  it("falls back to the first available agent in pool order", () => {
    const strategy = new PreferLocalStrategy("a");

    const selection = strategy.select([agent("a", 0, false), agent("b", 7), agent("c", 0)], context);

    expect(selection.agent.name).toBe("b");
    expect(selection.rationale).toBe(
      "Local agent 'a' is unavailable; first available agent in pool order",
    );
  });

  it("falls back when no local agent is configured", () => {
    const selection = new PreferLocalStrategy().select([agent("a", 4)], context);

    expect(selection.rationale).toBe(
      "No local agent configured; first available agent in pool order",
    );
  });

  it("throws rather than substituting when nothing is available", () => {
    const strategy = new PreferLocalStrategy("a");

    expect(() => strategy.select([agent("a", 0, false)], context)).toThrow(
      "No agent available for 'code': all 1 agents are unavailable",
    );
  });
});

describe("advice", () => {
  const candidates = [agent("a", 0), agent("b", 0)];

  it("enumerates the candidates in the prompt", () => {
    expect(buildTieBreakPrompt("code", undefined, candidates)).toBe(
      [
        "Problem type: code",
        "Description: (none)",
        "Candidates: a, b",
        "Reply with exactly one candidate name and nothing else.",
      ].join("\n"),
    );
  });

  it("accepts a reply naming exactly one candidate", () => {
    expect(parseAdvice("  b\n", candidates)?.name).toBe("b");
  });

  it("rejects replies that are not exactly a candidate name", () => {
    expect(parseAdvice("I would pick b", candidates)).toBeUndefined();
    expect(parseAdvice("z", candidates)).toBeUndefined();
    expect(parseAdvice("", candidates)).toBeUndefined();
  });
});
