/**
 * @tandem/errors
 *
 * Shared error taxonomy for the Tandem federation and routing engine.
 *
 * Each error carries a `.code` from the catalog that discriminates the
 * specific error condition and a `_tag` naming its behavioral base type.
 * Use `error.code === "XXX"` for fine-grained matching, or `instanceof`
 * against a domain base class (`FederationError`, `RoutingError`).
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isTandemError, TandemError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByDomain,
  getErrorMessage,
  isValidErrorCode,
  validateCatalog,
  wrapError,
} from "./utils.js";

export { InternalError } from "./bases/internal-error.js";

export type { TandemErrorOptions } from "./types.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export { PersistenceError, type PersistenceOperation } from "./persistence.js";

export {
  FederationConfigurationInvalidError,
  FederationError,
  FederationInvalidDirectionError,
  MalformedImportError,
} from "./federation.js";

export {
  AgentNotFoundError,
  NoAgentAvailableError,
  RouterConfigurationInvalidError,
  RoutingError,
} from "./routing.js";

export { OrchestrationConfigurationInvalidError } from "./orchestration.js";
