/**
 * Contract for the external knowledge store / chat backend.
 *
 * The engine calls these capabilities but never implements them. All three
 * are advisory or best-effort: a failure degrades to "no guidance" and never
 * aborts a primary operation.
 */

/** TTL that the backing store treats as "never expire". */
export const PERMANENT_TTL_DAYS = 36_500;

/** A record written to the collaborator's learning store. */
export interface LearningRecord {
  readonly query: string;
  readonly response: string;
  readonly category: string;
  /** Retention hint in days. */
  readonly ttlDays: number;
  readonly confidence?: number;
}

export interface KnowledgeCollaborator {
  /** Advisory guidance for a free-text question. */
  query(text: string): Promise<string>;
  /** Best-effort audit/learning sink. */
  store(record: LearningRecord): Promise<void>;
  /** Advisory decision input. Output is free text and must be validated. */
  chat(message: string): Promise<string>;
}
