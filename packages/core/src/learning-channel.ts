/**
 * Asynchronous, best-effort notification channel to the collaborator's
 * learning store.
 *
 * Records are queued and delivered one at a time, off the caller's path.
 * When the queue is full the new record is dropped. Delivery failures and
 * timeouts are logged and counted, never rethrown.
 */

import { FederationConfigurationInvalidError, getErrorMessage } from "@tandem/errors";
import { getLearningDropped } from "@tandem/telemetry";
import { z } from "zod";
import { DEFAULT_ADVISORY_TIMEOUT_MS, withTimeout } from "./advisory.js";
import type { KnowledgeCollaborator, LearningRecord } from "./collaborator-types.js";
import { logWarn } from "./log.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface LearningChannelConfig {
  /** Records waiting for delivery before new ones are dropped (default: 64). */
  readonly maxQueueSize?: number;
  /** Per-record delivery budget in ms (default: 5000). */
  readonly deliveryTimeoutMs?: number;
  /** Log tag (default: "learning"). */
  readonly label?: string;
}

export const DEFAULT_LEARNING_CHANNEL_CONFIG: Required<LearningChannelConfig> = {
  maxQueueSize: 64,
  deliveryTimeoutMs: DEFAULT_ADVISORY_TIMEOUT_MS,
  label: "learning",
};

const learningChannelConfigSchema = z.object({
  maxQueueSize: z.number().int().positive({ message: "maxQueueSize must be a positive integer" }),
  deliveryTimeoutMs: z.number().positive({ message: "deliveryTimeoutMs must be positive" }),
  label: z.string().min(1, { message: "label must not be empty" }),
});

/**
 * Merge overrides with defaults and validate.
 *
 * @throws {FederationConfigurationInvalidError} if a value is out of range.
 */
export function resolveLearningChannelConfig(
  overrides?: LearningChannelConfig,
): Required<LearningChannelConfig> {
  const merged = { ...DEFAULT_LEARNING_CHANNEL_CONFIG, ...overrides };
  const result = learningChannelConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new FederationConfigurationInvalidError(
      result.error.issues.map((issue) => issue.message).join("; "),
    );
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// LearningChannel
// ---------------------------------------------------------------------------

export interface LearningChannelStats {
  readonly published: number;
  readonly delivered: number;
  readonly dropped: number;
  readonly failed: number;
  readonly pending: number;
}

export class LearningChannel {
  private readonly sink: Pick<KnowledgeCollaborator, "store">;
  private readonly config: Required<LearningChannelConfig>;
  private readonly queue: LearningRecord[] = [];
  private draining: Promise<void> | null = null;
  private published = 0;
  private delivered = 0;
  private dropped = 0;
  private failed = 0;

  constructor(sink: Pick<KnowledgeCollaborator, "store">, config?: LearningChannelConfig) {
    this.sink = sink;
    this.config = resolveLearningChannelConfig(config);
  }

  /**
   * Queue a record for delivery. Returns false when the record was dropped
   * because the queue is full.
   */
  publish(record: LearningRecord): boolean {
    this.published += 1;

    if (this.queue.length >= this.config.maxQueueSize) {
      this.dropped += 1;
      getLearningDropped().add(1, { channel: this.config.label });
      logWarn(
        this.config.label,
        `Queue full: dropped '${record.category}' record (${this.config.maxQueueSize} pending)`,
      );
      return false;
    }

    this.queue.push(record);
    if (this.draining === null) {
      this.draining = this.drain();
    }
    return true;
  }

  /** Resolve once every queued record has been delivered or has failed. */
  async flush(): Promise<void> {
    while (this.draining !== null) {
      await this.draining;
    }
  }

  get stats(): LearningChannelStats {
    return {
      published: this.published,
      delivered: this.delivered,
      dropped: this.dropped,
      failed: this.failed,
      pending: this.queue.length,
    };
  }

  private async drain(): Promise<void> {
    try {
      for (let record = this.queue.shift(); record !== undefined; record = this.queue.shift()) {
        await this.deliver(record);
      }
    } finally {
      this.draining = null;
    }
  }

  private async deliver(record: LearningRecord): Promise<void> {
    try {
      const outcome = await withTimeout(
        this.sink.store(record).then(() => "stored" as const),
        this.config.deliveryTimeoutMs,
      );
      if (outcome === undefined) {
        this.failed += 1;
        logWarn(
          this.config.label,
          `Delivery of '${record.category}' record timed out after ${this.config.deliveryTimeoutMs}ms`,
        );
        return;
      }
      this.delivered += 1;
    } catch (error) {
      this.failed += 1;
      logWarn(
        this.config.label,
        `Delivery of '${record.category}' record failed: ${getErrorMessage(error)}`,
      );
    }
  }
}
