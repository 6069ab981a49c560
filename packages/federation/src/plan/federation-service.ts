/**
 * FederationService: one-way federation pass: plan against the target's
 * current entries, then record the survivors in the ledger.
 */

import type { KnowledgeEntry, SyncDirection } from "@tandem/core";
import type { ConflictResolver } from "../conflict/index.js";
import type { SyncLedger, SyncResult } from "../ledger/index.js";
import { planFederation } from "./plan-federation.js";

export interface FederationServiceOptions {
  readonly ledger: SyncLedger;
  /** Resolver with audit reporting. Conflicts are resolved silently when omitted. */
  readonly resolver?: ConflictResolver;
}

export interface FederationResult extends SyncResult {
  /** Source entries that lost a conflict and were not synced. */
  readonly skipped: number;
}

export class FederationService {
  private readonly ledger: SyncLedger;
  private readonly resolver: ConflictResolver | undefined;

  constructor(options: FederationServiceOptions) {
    this.ledger = options.ledger;
    this.resolver = options.resolver;
  }

  /**
   * @throws {FederationInvalidDirectionError} if the direction names the same repository twice.
   */
  async federate(
    sourceEntries: readonly KnowledgeEntry[],
    targetEntries: readonly KnowledgeEntry[],
    direction: SyncDirection,
  ): Promise<FederationResult> {
    const resolver = this.resolver;
    const plan = resolver
      ? planFederation(sourceEntries, targetEntries, (a, b) => resolver.decide(a, b))
      : planFederation(sourceEntries, targetEntries);
    const result = await this.ledger.syncBatch(plan.toSync, direction.from, direction.to);
    return {
      ...result,
      conflicts: plan.conflicts.length,
      skipped: plan.skipped.length,
    };
  }
}
