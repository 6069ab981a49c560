/**
 * KnowledgeImporter: stores another repository's entries in the local
 * knowledge store through the collaborator.
 *
 * Each entry is stored permanently. A failed entry is counted and, when the
 * collaborator can advise on the failure, the advice is kept as an
 * `error_recovery` learning record. The import as a whole is recorded as an
 * `import_pattern` record.
 */

import {
  adviseSafely,
  DEFAULT_ADVISORY_TIMEOUT_MS,
  DEFAULT_REPO_LABELS,
  type KnowledgeCollaborator,
  type KnowledgeEntry,
  type LearningChannel,
  type LearningRecord,
  PERMANENT_TTL_DAYS,
  type RepoId,
  type RepoLabels,
  withTimeout,
} from "@tandem/core";
import { summarizeKnowledge } from "./summary.js";

export interface KnowledgeImporterOptions {
  readonly collaborator: Pick<KnowledgeCollaborator, "store" | "query">;
  readonly learning: LearningChannel;
  /** Budget for each store and advisory call (default: 5000). */
  readonly timeoutMs?: number;
  readonly labels?: RepoLabels;
}

export interface ImportResult {
  readonly imported: number;
  readonly errors: number;
  /** 0 when there are no entries. */
  readonly averageConfidence: number;
  /** Number of distinct categories. */
  readonly categories: number;
}

/** Store did not answer within its budget. */
class StoreTimeoutError extends Error {
  override readonly name = "StoreTimeoutError";
}

function toStoredRecord(entry: KnowledgeEntry): LearningRecord {
  return {
    query: entry.query ?? entry.id,
    response: entry.response ?? "",
    category: entry.category,
    confidence: entry.confidence,
    ttlDays: PERMANENT_TTL_DAYS,
  };
}

export class KnowledgeImporter {
  private readonly collaborator: Pick<KnowledgeCollaborator, "store" | "query">;
  private readonly learning: LearningChannel;
  private readonly timeoutMs: number;
  private readonly labels: RepoLabels;

  constructor(options: KnowledgeImporterOptions) {
    this.collaborator = options.collaborator;
    this.learning = options.learning;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_ADVISORY_TIMEOUT_MS;
    this.labels = options.labels ?? DEFAULT_REPO_LABELS;
  }

  /**
   * Store every entry. Never raises for a single entry.
   *
   * @param origin - Repository the entries were exported from.
   */
  async importEntries(
    entries: readonly KnowledgeEntry[],
    origin: RepoId,
  ): Promise<ImportResult> {
    let imported = 0;
    let errors = 0;

    for (const entry of entries) {
      try {
        await this.store(entry);
        imported += 1;
      } catch (error) {
        errors += 1;
        await this.recordRecovery(error instanceof Error ? error.name : "UnknownError");
      }
    }

    const summary = summarizeKnowledge(entries);
    const categories = Object.keys(summary.categories).length;
    const source = this.labels[origin];
    this.learning.publish({
      query: `How do I import knowledge entries from ${source}?`,
      response: `Imported ${imported} of ${entries.length} entries from ${source} (${errors} errors). Average confidence: ${summary.avgConfidence.toFixed(2)}. Categories: ${categories}.`,
      category: "import_pattern",
      ttlDays: PERMANENT_TTL_DAYS,
    });

    return { imported, errors, averageConfidence: summary.avgConfidence, categories };
  }

  private async store(entry: KnowledgeEntry): Promise<void> {
    const stored = await withTimeout(
      this.collaborator.store(toStoredRecord(entry)).then(() => true),
      this.timeoutMs,
    );
    if (stored === undefined) {
      throw new StoreTimeoutError(
        `Storing entry '${entry.id}' timed out after ${this.timeoutMs}ms`,
      );
    }
  }

  private async recordRecovery(errorName: string): Promise<void> {
    const guidance = await adviseSafely(
      () => this.collaborator.query(`How do I fix import error: ${errorName}?`),
      { timeoutMs: this.timeoutMs, fallback: "", label: "knowledge-importer:query" },
    );
    if (guidance.trim() === "") return;

    this.learning.publish({
      query: `How to fix import error: ${errorName}`,
      response: guidance,
      category: "error_recovery",
      ttlDays: PERMANENT_TTL_DAYS,
    });
  }
}
