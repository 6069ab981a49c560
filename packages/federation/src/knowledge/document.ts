/**
 * Knowledge exchange document: the portable JSON form in which one
 * repository hands its entries to the other.
 *
 * ```json
 * {
 *   "version": "1.0",
 *   "timestamp": "2026-01-01T00:00:00.000Z",
 *   "total_entries": 1,
 *   "entries": [
 *     { "id": "k1", "query": "…", "response": "…", "category": "errors",
 *       "confidence": 0.9, "created_at": "2026-01-01T00:00:00.000Z" }
 *   ]
 * }
 * ```
 */

import {
  type Clock,
  defaultClock,
  isoNow,
  JsonStateFile,
  type KnowledgeEntry,
  type RepoId,
} from "@tandem/core";
import { type MalformedImportError, PersistenceError } from "@tandem/errors";
import { z } from "zod";
import { confidenceSchema, entryIdSchema, validateEntry } from "../validation.js";

export const KNOWLEDGE_DOCUMENT_VERSION = "1.0";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const exchangeEntrySchema = z.object(
  {
    id: entryIdSchema,
    query: z.string({ invalid_type_error: "query must be a string" }).default(""),
    response: z.string({ invalid_type_error: "response must be a string" }).default(""),
    category: z.string({ invalid_type_error: "category must be a string" }).default("unknown"),
    confidence: confidenceSchema,
    created_at: z.string({
      required_error: "created_at is required",
      invalid_type_error: "created_at must be a string",
    }),
  },
  { invalid_type_error: "entry must be an object", required_error: "entry must be an object" },
);

export type ExchangeEntry = z.infer<typeof exchangeEntrySchema>;

/** Envelope only; entries are validated one by one. */
export const knowledgeDocumentSchema = z.object({
  version: z.literal(KNOWLEDGE_DOCUMENT_VERSION),
  timestamp: z.string(),
  total_entries: z.number().int().nonnegative(),
  entries: z.array(z.unknown()),
});

export type KnowledgeDocument = z.infer<typeof knowledgeDocumentSchema>;

export interface KnowledgeDocumentRead {
  readonly entries: readonly KnowledgeEntry[];
  readonly malformed: readonly MalformedImportError[];
}

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

export function toExchangeEntry(entry: KnowledgeEntry): ExchangeEntry {
  return {
    id: entry.id,
    query: entry.query ?? "",
    response: entry.response ?? "",
    category: entry.category,
    confidence: entry.confidence,
    created_at: entry.createdAt,
  };
}

export function fromExchangeEntry(entry: ExchangeEntry, origin: RepoId): KnowledgeEntry {
  return {
    id: entry.id,
    sourceRepo: origin,
    category: entry.category,
    confidence: entry.confidence,
    createdAt: entry.created_at,
    query: entry.query,
    response: entry.response,
  };
}

// ---------------------------------------------------------------------------
// Read / write
// ---------------------------------------------------------------------------

/**
 * Export entries to an exchange document (atomic replace).
 *
 * @throws {PersistenceError} if the document cannot be written.
 */
export async function writeKnowledgeDocument(
  path: string,
  entries: readonly KnowledgeEntry[],
  clock: Clock = defaultClock,
): Promise<KnowledgeDocument> {
  const document: KnowledgeDocument = {
    version: KNOWLEDGE_DOCUMENT_VERSION,
    timestamp: isoNow(clock),
    total_entries: entries.length,
    entries: entries.map(toExchangeEntry),
  };
  await new JsonStateFile(path, knowledgeDocumentSchema).write(document);
  return document;
}

/**
 * Load an exchange document. Entries that fail validation are returned as
 * `malformed` rather than failing the whole read.
 *
 * @param origin - Repository the document was exported from.
 * @throws {PersistenceError} if the file is missing, not JSON, or not an exchange document.
 */
export async function readKnowledgeDocument(
  path: string,
  origin: RepoId,
): Promise<KnowledgeDocumentRead> {
  const document = await new JsonStateFile(path, knowledgeDocumentSchema).read();
  if (document === null) {
    throw new PersistenceError("read", path, "file does not exist");
  }

  const entries: KnowledgeEntry[] = [];
  const malformed: MalformedImportError[] = [];
  for (const [index, raw] of document.entries.entries()) {
    const validation = validateEntry(exchangeEntrySchema, raw, index);
    if (validation.ok) {
      entries.push(fromExchangeEntry(validation.value, origin));
    } else {
      malformed.push(validation.error);
    }
  }
  return { entries, malformed };
}
