/**
 * Conflict resolution between two versions of the same knowledge entry.
 *
 * Pure decision function plus a thin wrapper that reports each decision to
 * the learning channel.
 */

import {
  type KnowledgeEntry,
  type LearningChannel,
  PERMANENT_TTL_DAYS,
} from "@tandem/core";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Confidence gap above which confidence alone decides. */
export const CONFIDENCE_MARGIN = 0.1;

/** Confidences are compared in millionths so that 0.4 - 0.3 counts as 0.1. */
const CONFIDENCE_SCALE = 1_000_000;

function exceedsMargin(left: number, right: number): boolean {
  return (
    Math.round(Math.abs(left - right) * CONFIDENCE_SCALE) >
    Math.round(CONFIDENCE_MARGIN * CONFIDENCE_SCALE)
  );
}

/** Which rule picked the winner. */
export type ResolutionRule = "confidence" | "recency" | "tie";

export interface ConflictResolution {
  readonly winner: KnowledgeEntry;
  readonly loser: KnowledgeEntry;
  readonly rule: ResolutionRule;
  readonly reason: string;
}

// ---------------------------------------------------------------------------
// resolveConflict
// ---------------------------------------------------------------------------

/**
 * Compare two `createdAt` values. Temporal when both parse as dates,
 * lexicographic otherwise.
 */
function compareCreatedAt(left: string, right: string): number {
  const leftMs = Date.parse(left);
  const rightMs = Date.parse(right);
  if (Number.isFinite(leftMs) && Number.isFinite(rightMs)) {
    return leftMs - rightMs;
  }
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

/**
 * Decide which of two entries survives.
 *
 * Algorithm:
 * 1. Confidence gap > 0.1 → higher confidence wins.
 * 2. Otherwise the later `createdAt` wins.
 * 3. Equal timestamps → `a` wins.
 */
export function resolveConflict(a: KnowledgeEntry, b: KnowledgeEntry): ConflictResolution {
  if (exceedsMargin(a.confidence, b.confidence)) {
    const [winner, loser]: [KnowledgeEntry, KnowledgeEntry] =
      a.confidence > b.confidence ? [a, b] : [b, a];
    return {
      winner,
      loser,
      rule: "confidence",
      reason: `Confidence ${winner.confidence} beats ${loser.confidence} by more than ${CONFIDENCE_MARGIN}`,
    };
  }

  const order = compareCreatedAt(a.createdAt, b.createdAt);
  if (order === 0) {
    return {
      winner: a,
      loser: b,
      rule: "tie",
      reason: `Similar confidence and identical timestamps (${a.createdAt}): first entry kept`,
    };
  }

  const [winner, loser]: [KnowledgeEntry, KnowledgeEntry] = order > 0 ? [a, b] : [b, a];
  return {
    winner,
    loser,
    rule: "recency",
    reason: `Similar confidence: ${winner.createdAt} is more recent than ${loser.createdAt}`,
  };
}

// ---------------------------------------------------------------------------
// ConflictResolver
// ---------------------------------------------------------------------------

export interface ConflictResolverOptions {
  /** Receives one audit record per decision. */
  readonly learning?: LearningChannel;
}

export class ConflictResolver {
  private readonly learning: LearningChannel | undefined;

  constructor(options: ConflictResolverOptions = {}) {
    this.learning = options.learning;
  }

  /** Resolve and report the full decision. */
  decide(a: KnowledgeEntry, b: KnowledgeEntry): ConflictResolution {
    const resolution = resolveConflict(a, b);
    this.learning?.publish({
      query: `Which version of knowledge entry '${a.id}' should be kept?`,
      response: `Kept '${resolution.winner.id}' from ${resolution.winner.sourceRepo} over '${resolution.loser.id}' from ${resolution.loser.sourceRepo} (rule: ${resolution.rule})`,
      category: "conflict_resolution",
      ttlDays: PERMANENT_TTL_DAYS,
      confidence: resolution.winner.confidence,
    });
    return resolution;
  }

  /** Resolve and return the surviving entry. */
  resolve(a: KnowledgeEntry, b: KnowledgeEntry): KnowledgeEntry {
    return this.decide(a, b).winner;
  }
}
