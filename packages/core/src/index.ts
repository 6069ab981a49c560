/**
 * @tandem/core: shared kernel for the federation and routing packages.
 *
 * Domain types, the collaborator contract, clock, logging, and the
 * persistence and best-effort delivery primitives every component builds on.
 */

export const PACKAGE_NAME = "@tandem/core" as const;

// Types
export { type AgentDescriptor, DEFAULT_PROBLEM_TYPE } from "./agent-types.js";
export { type Clock, defaultClock, isoNow } from "./clock-types.js";
export {
  type KnowledgeCollaborator,
  type LearningRecord,
  PERMANENT_TTL_DAYS,
} from "./collaborator-types.js";
export {
  DEFAULT_REPO_LABELS,
  formatDirection,
  isRepoId,
  type KnowledgeEntry,
  REPO_IDS,
  type RepoId,
  type RepoLabels,
  type SyncDirection,
  sameDirection,
} from "./knowledge-types.js";

// Runtime
export {
  adviseSafely,
  type AdviseOptions,
  DEFAULT_ADVISORY_TIMEOUT_MS,
  withTimeout,
} from "./advisory.js";
export {
  DEFAULT_LEARNING_CHANNEL_CONFIG,
  LearningChannel,
  type LearningChannelConfig,
  type LearningChannelStats,
  resolveLearningChannelConfig,
} from "./learning-channel.js";
export { logWarn } from "./log.js";
export { SerialLock } from "./serial-lock.js";
export { DEFAULT_RETENTION, JsonStateFile, retainLast } from "./state-file.js";
