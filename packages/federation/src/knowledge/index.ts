export {
  type ExchangeEntry,
  exchangeEntrySchema,
  fromExchangeEntry,
  KNOWLEDGE_DOCUMENT_VERSION,
  type KnowledgeDocument,
  type KnowledgeDocumentRead,
  knowledgeDocumentSchema,
  readKnowledgeDocument,
  toExchangeEntry,
  writeKnowledgeDocument,
} from "./document.js";
export { type ImportResult, KnowledgeImporter, type KnowledgeImporterOptions } from "./importer.js";
export { type KnowledgeSummary, summarizeKnowledge } from "./summary.js";
