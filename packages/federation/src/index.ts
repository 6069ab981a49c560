/**
 * @tandem/federation: bidirectional knowledge sync between two repositories
 *
 * Provides the sync ledger, conflict resolution, the federation pass that
 * ties them together, and the portable knowledge exchange document.
 */

// ---------------------------------------------------------------------------
// Sync ledger
// ---------------------------------------------------------------------------

export {
  DEFAULT_SYNC_LEDGER_CONFIG,
  resolveLedgerConfig,
  type SyncEvent,
  type SyncFailure,
  SyncLedger,
  type SyncLedgerConfig,
  type SyncLedgerDocument,
  syncLedgerDocumentSchema,
  type SyncLedgerOptions,
  type SyncResult,
  type SyncStats,
} from "./ledger/index.js";

// ---------------------------------------------------------------------------
// Conflict resolution
// ---------------------------------------------------------------------------

export {
  CONFIDENCE_MARGIN,
  type ConflictResolution,
  ConflictResolver,
  type ConflictResolverOptions,
  type ResolutionRule,
  resolveConflict,
} from "./conflict/index.js";

// ---------------------------------------------------------------------------
// Federation pass
// ---------------------------------------------------------------------------

export {
  type FederationPlan,
  type FederationResult,
  FederationService,
  type FederationServiceOptions,
  planFederation,
  type ResolveFn,
} from "./plan/index.js";

// ---------------------------------------------------------------------------
// Knowledge exchange
// ---------------------------------------------------------------------------

export {
  type ExchangeEntry,
  exchangeEntrySchema,
  fromExchangeEntry,
  type ImportResult,
  KNOWLEDGE_DOCUMENT_VERSION,
  type KnowledgeDocument,
  type KnowledgeDocumentRead,
  knowledgeDocumentSchema,
  KnowledgeImporter,
  type KnowledgeImporterOptions,
  type KnowledgeSummary,
  readKnowledgeDocument,
  summarizeKnowledge,
  toExchangeEntry,
  writeKnowledgeDocument,
} from "./knowledge/index.js";

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export { type SyncEntryRef, syncEntryRefSchema } from "./validation.js";
