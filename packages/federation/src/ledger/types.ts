/**
 * Sync ledger types.
 */

import type { Clock, SyncDirection } from "@tandem/core";
import type { ErrorCode } from "@tandem/errors";

/** One entry crossing from one repository to the other. Immutable once appended. */
export interface SyncEvent {
  /** ISO 8601 */
  readonly timestamp: string;
  readonly entryId: string;
  readonly direction: SyncDirection;
}

/** A batch entry that could not be synced. */
export interface SyncFailure {
  /** Position of the entry in the submitted batch. */
  readonly index: number;
  readonly entryId: string | null;
  readonly code: ErrorCode;
  readonly message: string;
}

export interface SyncResult {
  readonly synced: number;
  /** Always 0 here; conflicts are resolved before the ledger (see `planFederation`). */
  readonly conflicts: number;
  readonly errors: number;
  readonly direction: SyncDirection;
  /** ISO 8601, taken when the batch finished. */
  readonly timestamp: string;
  readonly failures: readonly SyncFailure[];
}

export interface SyncStats {
  readonly total: number;
  readonly aToB: number;
  readonly bToA: number;
  /** Timestamp of the most recent event, or null when the ledger is empty. */
  readonly lastSync: string | null;
}

export interface SyncLedgerConfig {
  /** Events kept in the persisted document (default: 100). */
  readonly retention?: number;
}

export interface SyncLedgerOptions extends SyncLedgerConfig {
  /** Where the ledger persists itself. In-memory only when omitted. */
  readonly statePath?: string;
  readonly clock?: Clock;
}
