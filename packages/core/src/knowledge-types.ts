/**
 * Knowledge federation types.
 *
 * Two repositories ("nodes") take part in federation. They are identified
 * structurally as `A` and `B`; human-facing names are configuration.
 */

// ---------------------------------------------------------------------------
// Repositories
// ---------------------------------------------------------------------------

export const REPO_IDS = ["A", "B"] as const;

/** One of the two federated repositories. */
export type RepoId = (typeof REPO_IDS)[number];

/** Direction of a sync: entries flow `from` one repository `to` the other. */
export interface SyncDirection {
  readonly from: RepoId;
  readonly to: RepoId;
}

/** Display names for the two repositories (e.g. `{ A: "lore", B: "proxy" }`). */
export type RepoLabels = Readonly<Record<RepoId, string>>;

export const DEFAULT_REPO_LABELS: RepoLabels = { A: "A", B: "B" };

export function isRepoId(value: unknown): value is RepoId {
  return value === "A" || value === "B";
}

export function sameDirection(left: SyncDirection, right: SyncDirection): boolean {
  return left.from === right.from && left.to === right.to;
}

/** Render a direction for humans, e.g. `A → B`. */
export function formatDirection(
  direction: SyncDirection,
  labels: RepoLabels = DEFAULT_REPO_LABELS,
): string {
  return `${labels[direction.from]} → ${labels[direction.to]}`;
}

// ---------------------------------------------------------------------------
// Knowledge entries
// ---------------------------------------------------------------------------

/**
 * A learned entry held by one of the repositories.
 *
 * Consumed, not owned, by the federation engine: confidence is compared,
 * never rewritten.
 */
export interface KnowledgeEntry {
  /** Opaque identifier, unique within the owning repository. */
  readonly id: string;
  readonly sourceRepo: RepoId;
  /** Free-form tag. */
  readonly category: string;
  /** 0.0–1.0 */
  readonly confidence: number;
  /** ISO 8601 */
  readonly createdAt: string;
  readonly query?: string;
  readonly response?: string;
}
