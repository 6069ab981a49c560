export { DEFAULT_SYNC_LEDGER_CONFIG, resolveLedgerConfig } from "./config.js";
export { type SyncLedgerDocument, syncLedgerDocumentSchema } from "./schema.js";
export { SyncLedger } from "./sync-ledger.js";
export type {
  SyncEvent,
  SyncFailure,
  SyncLedgerConfig,
  SyncLedgerOptions,
  SyncResult,
  SyncStats,
} from "./types.js";
