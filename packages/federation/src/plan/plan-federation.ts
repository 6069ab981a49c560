/**
 * Conflict pre-step: decide which source entries should cross to the target
 * before anything reaches the ledger.
 */

import type { KnowledgeEntry } from "@tandem/core";
import { type ConflictResolution, resolveConflict } from "../conflict/index.js";

export type ResolveFn = (a: KnowledgeEntry, b: KnowledgeEntry) => ConflictResolution;

export interface FederationPlan {
  /** Source entries to sync: new to the target, or winners of a conflict. */
  readonly toSync: readonly KnowledgeEntry[];
  /** Every id present on both sides, with the decision taken. */
  readonly conflicts: readonly ConflictResolution[];
  /** Source entries that lost to the target's version. */
  readonly skipped: readonly KnowledgeEntry[];
}

/**
 * Pair source and target entries by id. Entries the target lacks are queued;
 * for ids held by both the resolver decides, source first.
 */
export function planFederation(
  sourceEntries: readonly KnowledgeEntry[],
  targetEntries: readonly KnowledgeEntry[],
  resolve: ResolveFn = resolveConflict,
): FederationPlan {
  const targetById = new Map(targetEntries.map((entry) => [entry.id, entry]));
  const toSync: KnowledgeEntry[] = [];
  const conflicts: ConflictResolution[] = [];
  const skipped: KnowledgeEntry[] = [];

  for (const entry of sourceEntries) {
    const existing = targetById.get(entry.id);
    if (existing === undefined) {
      toSync.push(entry);
      continue;
    }

    const resolution = resolve(entry, existing);
    conflicts.push(resolution);
    if (resolution.winner === entry) {
      toSync.push(entry);
    } else {
      skipped.push(entry);
    }
  }

  return { toSync, conflicts, skipped };
}
