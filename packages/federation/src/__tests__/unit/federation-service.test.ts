import { type KnowledgeEntry, LearningChannel, type RepoId } from "@tandem/core";
import { createMockCollaborator, FakeClock } from "@tandem/test-utils";
import { describe, expect, it, vi } from "vitest";
import { type ConflictResolution, ConflictResolver } from "../../conflict/index.js";
import { SyncLedger } from "../../ledger/index.js";
import { FederationService, planFederation } from "../../plan/index.js";

function entry(id: string, sourceRepo: RepoId, confidence: number): KnowledgeEntry {
  return { id, sourceRepo, category: "patterns", confidence, createdAt: "2026-01-01T00:00:00.000Z" };
}

const source = [entry("k1", "A", 0.6), entry("k2", "A", 0.9), entry("k3", "A", 0.2)];
const target = [entry("k2", "B", 0.5), entry("k3", "B", 0.9), entry("k9", "B", 0.7)];

describe("planFederation", () => {
  it("queues new entries and conflict winners, skips conflict losers", () => {
    const plan = planFederation(source, target);

    expect(plan.toSync.map((e) => e.id)).toEqual(["k1", "k2"]);
    expect(plan.skipped.map((e) => e.id)).toEqual(["k3"]);
    expect(plan.conflicts.map((c) => [c.winner.sourceRepo, c.rule])).toEqual([
      ["A", "confidence"],
      ["B", "confidence"],
    ]);
  });

  it("asks the resolver with the source entry first", () => {
    const resolve = vi.fn(
      (a: KnowledgeEntry, b: KnowledgeEntry): ConflictResolution => ({
        winner: b,
        loser: a,
        rule: "tie",
        reason: "target kept",
      }),
    );

    const plan = planFederation([entry("k2", "A", 0.9)], [entry("k2", "B", 0.1)], resolve);

    expect(resolve).toHaveBeenCalledWith(
      expect.objectContaining({ sourceRepo: "A" }),
      expect.objectContaining({ sourceRepo: "B" }),
    );
    expect(plan.toSync).toEqual([]);
    expect(plan.skipped).toHaveLength(1);
  });

  it("queues everything when the target is empty", () => {
    const plan = planFederation(source, []);

    expect(plan.toSync).toHaveLength(3);
    expect(plan.conflicts).toEqual([]);
  });
});

describe("FederationService", () => {
  it("records planned entries in the ledger and reports conflicts", async () => {
    const ledger = new SyncLedger({ clock: new FakeClock() });
    const service = new FederationService({ ledger });

    const result = await service.federate(source, target, { from: "A", to: "B" });

    expect(result).toMatchObject({
      synced: 2,
      conflicts: 2,
      skipped: 1,
      errors: 0,
      direction: { from: "A", to: "B" },
    });
    expect(ledger.history.map((e) => e.entryId)).toEqual(["k1", "k2"]);
    expect(ledger.getSyncStats()).toMatchObject({ aToB: 2, bToA: 0 });
  });

  it("reports each conflict decision through the resolver", async () => {
    const sink = createMockCollaborator();
    const learning = new LearningChannel(sink);
    const service = new FederationService({
      ledger: new SyncLedger({ clock: new FakeClock() }),
      resolver: new ConflictResolver({ learning }),
    });

    await service.federate(source, target, { from: "A", to: "B" });
    await learning.flush();

    expect(sink.store).toHaveBeenCalledTimes(2);
    expect(sink.store.mock.calls.map(([record]) => record.category)).toEqual([
      "conflict_resolution",
      "conflict_resolution",
    ]);
  });

  it("rejects a direction that names one repository twice", async () => {
    const service = new FederationService({ ledger: new SyncLedger() });

    await expect(service.federate(source, target, { from: "A", to: "A" })).rejects.toMatchObject({
      code: "FEDERATION_INVALID_DIRECTION",
    });
  });
});
