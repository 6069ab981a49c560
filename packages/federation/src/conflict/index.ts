export {
  CONFIDENCE_MARGIN,
  type ConflictResolution,
  ConflictResolver,
  type ConflictResolverOptions,
  type ResolutionRule,
  resolveConflict,
} from "./conflict-resolver.js";
