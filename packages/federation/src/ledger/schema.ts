/**
 * On-disk shape of the sync ledger.
 *
 * ```json
 * {
 *   "last_sync": "2026-01-01T00:00:00.000Z",
 *   "sync_count": 2,
 *   "syncs": [{ "timestamp": "…", "entry_id": "k1", "direction": { "from": "A", "to": "B" } }]
 * }
 * ```
 */

import { REPO_IDS } from "@tandem/core";
import { z } from "zod";
import type { SyncEvent } from "./types.js";

const repoIdSchema = z.enum(REPO_IDS);

const persistedSyncEventSchema = z.object({
  timestamp: z.string(),
  entry_id: z.string().min(1),
  direction: z.object({ from: repoIdSchema, to: repoIdSchema }),
});

export const syncLedgerDocumentSchema = z.object({
  last_sync: z.string().nullable(),
  sync_count: z.number().int().nonnegative(),
  syncs: z.array(persistedSyncEventSchema),
});

export type SyncLedgerDocument = z.infer<typeof syncLedgerDocumentSchema>;
type PersistedSyncEvent = z.infer<typeof persistedSyncEventSchema>;

export function toPersistedEvent(event: SyncEvent): PersistedSyncEvent {
  return {
    timestamp: event.timestamp,
    entry_id: event.entryId,
    direction: { from: event.direction.from, to: event.direction.to },
  };
}

export function fromPersistedEvent(event: PersistedSyncEvent): SyncEvent {
  return {
    timestamp: event.timestamp,
    entryId: event.entry_id,
    direction: { from: event.direction.from, to: event.direction.to },
  };
}
