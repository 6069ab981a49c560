import { MalformedImportError } from "@tandem/errors";
import { describe, expect, it } from "vitest";
import { getReporter, JsonReporter, TextReporter } from "../../reporters/index.js";

describe("TextReporter", () => {
  const reporter = new TextReporter();

  it("renders sync stats with aligned values", () => {
    const output = reporter.syncStats({
      total: 2,
      aToB: 1,
      bToA: 1,
      lastSync: "2026-01-01T00:00:00.000Z",
    });

    expect(output.split("\n")).toEqual([
      "Sync stats",
      "  Total      2",
      "  A → B      1",
      "  B → A      1",
      "  Last sync  2026-01-01T00:00:00.000Z",
    ]);
  });

  it("renders an empty sync ledger", () => {
    const output = reporter.syncStats({ total: 0, aToB: 0, bToA: 0, lastSync: null });
    expect(output.split("\n").at(-1)).toBe("  Last sync  never");
  });

  it("renders empty routing stats", () => {
    const output = reporter.routingStats({
      totalRouted: 0,
      byAgent: {},
      byProblemType: {},
      lastRouting: null,
    });

    expect(output.split("\n")).toEqual([
      "Routing stats",
      "  Total routed  0",
      "  Last routing  never",
      "By agent",
      "  (none)",
      "By problem type",
      "  (none)",
    ]);
  });

  it("renders routing counts per agent and problem type", () => {
    const output = reporter.routingStats({
      totalRouted: 3,
      byAgent: { a: 1, bravo: 2 },
      byProblemType: { code: 3 },
      lastRouting: {
        timestamp: "2026-01-01T00:00:00.000Z",
        problemType: "code",
        selectedAgent: "bravo",
        rationale: "Least loaded available agent (load 0)",
      },
    });

    expect(output.split("\n")).toEqual([
      "Routing stats",
      "  Total routed  3",
      "  Last routing  bravo for code at 2026-01-01T00:00:00.000Z",
      "By agent",
      "  a      1",
      "  bravo  2",
      "By problem type",
      "  code  3",
    ]);
  });

  it("renders a knowledge summary with malformed entries", () => {
    const output = reporter.knowledgeSummary(
      { totalEntries: 2, categories: { code: 2 }, minConfidence: 0.5, avgConfidence: 0.75 },
      [new MalformedImportError(1, null, ["confidence is required"])],
    );

    expect(output.split("\n")).toEqual([
      "Knowledge summary",
      "  Entries         2",
      "  Min confidence  0.50",
      "  Avg confidence  0.75",
      "  Malformed       1",
      "Categories",
      "  code  2",
      "Malformed entries",
      "  Malformed knowledge entry at index 1: confidence is required",
    ]);
  });
});

describe("JsonReporter", () => {
  const reporter = new JsonReporter();

  it("outputs the stats as JSON", () => {
    const stats = { total: 1, aToB: 1, bToA: 0, lastSync: "2026-01-01T00:00:00.000Z" };
    expect(JSON.parse(reporter.syncStats(stats))).toEqual(stats);
  });

  it("flattens malformed entries into plain objects", () => {
    const output = reporter.knowledgeSummary(
      { totalEntries: 0, categories: {}, minConfidence: 0, avgConfidence: 0 },
      [new MalformedImportError(0, "e-1", ["confidence must be a number"])],
    );

    expect(JSON.parse(output)).toEqual({
      totalEntries: 0,
      categories: {},
      minConfidence: 0,
      avgConfidence: 0,
      malformed: [{ index: 0, id: "e-1", issues: ["confidence must be a number"] }],
    });
  });
});

describe("getReporter", () => {
  it("maps formats to reporters", () => {
    expect(getReporter("text").name).toBe("text");
    expect(getReporter("json").name).toBe("json");
  });
});
