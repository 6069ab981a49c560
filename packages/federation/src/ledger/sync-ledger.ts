/**
 * SyncLedger: append-only record of knowledge moving between the two
 * repositories.
 *
 * Appending and persisting happen together under one lock, so concurrent
 * batches never lose events to interleaved whole-file rewrites.
 */

import {
  type Clock,
  defaultClock,
  isoNow,
  JsonStateFile,
  type RepoId,
  retainLast,
  SerialLock,
  type SyncDirection,
  sameDirection,
} from "@tandem/core";
import { FederationInvalidDirectionError, wrapError } from "@tandem/errors";
import { getSyncEvents, withSpan } from "@tandem/telemetry";
import { syncEntryRefSchema, validateEntry } from "../validation.js";
import { resolveLedgerConfig } from "./config.js";
import {
  fromPersistedEvent,
  type SyncLedgerDocument,
  syncLedgerDocumentSchema,
  toPersistedEvent,
} from "./schema.js";
import type {
  SyncEvent,
  SyncFailure,
  SyncLedgerOptions,
  SyncResult,
  SyncStats,
} from "./types.js";

const A_TO_B: SyncDirection = { from: "A", to: "B" };
const B_TO_A: SyncDirection = { from: "B", to: "A" };

function toDirection(source: RepoId, target: RepoId): SyncDirection {
  if (source === target) {
    throw new FederationInvalidDirectionError(source, target);
  }
  return { from: source, to: target };
}

export class SyncLedger {
  private readonly events: SyncEvent[] = [];
  private readonly lock = new SerialLock();
  private readonly clock: Clock;
  private readonly retention: number;
  private readonly stateFile: JsonStateFile<SyncLedgerDocument> | null;

  constructor(options: SyncLedgerOptions = {}) {
    this.clock = options.clock ?? defaultClock;
    this.retention = resolveLedgerConfig(options).retention;
    this.stateFile =
      options.statePath !== undefined
        ? new JsonStateFile(options.statePath, syncLedgerDocumentSchema)
        : null;
  }

  /**
   * Create a ledger and load its persisted events. A missing state file
   * yields an empty ledger.
   *
   * @throws {PersistenceError} if the state file is unreadable or malformed.
   */
  static async open(options: SyncLedgerOptions = {}): Promise<SyncLedger> {
    const ledger = new SyncLedger(options);
    const document = await ledger.stateFile?.read();
    if (document) {
      ledger.events.push(...document.syncs.map(fromPersistedEvent));
    }
    return ledger;
  }

  /** Events in append order. */
  get history(): readonly SyncEvent[] {
    return [...this.events];
  }

  /**
   * Append a sync event stamped with the current time, then persist.
   *
   * @throws {FederationInvalidDirectionError} if source and target are the same repository.
   * @throws {PersistenceError} if the ledger cannot be written; the event stays in memory.
   */
  async registerSync(entryId: string, source: RepoId, target: RepoId): Promise<SyncEvent> {
    const direction = toDirection(source, target);
    return this.lock.run(async () => {
      const event: SyncEvent = { timestamp: isoNow(this.clock), entryId, direction };
      this.events.push(event);
      getSyncEvents().add(1, { "tandem.sync.from": source, "tandem.sync.to": target });
      await this.persist();
      return event;
    });
  }

  /**
   * Register every valid entry of a batch. Malformed entries and per-entry
   * failures are counted and reported, never raised.
   *
   * @throws {FederationInvalidDirectionError} if source and target are the same repository.
   */
  async syncBatch(
    entries: readonly unknown[],
    source: RepoId,
    target: RepoId,
  ): Promise<SyncResult> {
    const direction = toDirection(source, target);
    return withSpan(
      "tandem.federation.sync_batch",
      {
        "tandem.sync.from": source,
        "tandem.sync.to": target,
        "tandem.sync.batch_size": entries.length,
      },
      async (span) => {
        const failures: SyncFailure[] = [];
        let synced = 0;

        for (const [index, raw] of entries.entries()) {
          const validation = validateEntry(syncEntryRefSchema, raw, index);
          if (!validation.ok) {
            failures.push({
              index,
              entryId: validation.error.entryId,
              code: validation.error.code,
              message: validation.error.message,
            });
            continue;
          }

          try {
            await this.registerSync(validation.value.id, source, target);
            synced += 1;
          } catch (error) {
            const wrapped = wrapError(error);
            failures.push({
              index,
              entryId: validation.value.id,
              code: wrapped.code,
              message: wrapped.message,
            });
          }
        }

        span.setAttributes({ "tandem.sync.synced": synced, "tandem.sync.errors": failures.length });
        return {
          synced,
          conflicts: 0,
          errors: failures.length,
          direction,
          timestamp: isoNow(this.clock),
          failures,
        };
      },
    );
  }

  getSyncStats(): SyncStats {
    let aToB = 0;
    let bToA = 0;
    for (const event of this.events) {
      if (sameDirection(event.direction, A_TO_B)) aToB += 1;
      else if (sameDirection(event.direction, B_TO_A)) bToA += 1;
    }
    return {
      total: this.events.length,
      aToB,
      bToA,
      lastSync: this.events.at(-1)?.timestamp ?? null,
    };
  }

  private async persist(): Promise<void> {
    if (this.stateFile === null) return;
    await this.stateFile.write({
      last_sync: this.events.at(-1)?.timestamp ?? null,
      sync_count: this.events.length,
      syncs: retainLast(this.events, this.retention).map(toPersistedEvent),
    });
  }
}
