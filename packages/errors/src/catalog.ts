/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the Tandem packages. Each code maps to an
 * HTTP status, a gRPC canonical code, and one of the base error types.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: internal, state, federation, routing, orchestration
 */

/**
 * Behavioral base error types that catalog codes map to.
 */
export type BaseErrorType = "ValidationError" | "NotFoundError" | "ExternalError" | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    grpcCode: "INTERNAL" as const,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // STATE ERRORS - Persisted state documents
  // ============================================================================
  STATE_READ_FAILED: {
    domain: "state",
    httpStatus: 500,
    grpcCode: "DATA_LOSS" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "State document unreadable",
    description: "The persisted state document could not be read or is malformed",
  },
  STATE_WRITE_FAILED: {
    domain: "state",
    httpStatus: 500,
    grpcCode: "UNAVAILABLE" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "State document unwritable",
    description: "The persisted state document could not be written",
  },

  // ============================================================================
  // FEDERATION ERRORS - Knowledge sync between nodes
  // ============================================================================
  FEDERATION_MALFORMED_IMPORT: {
    domain: "federation",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Malformed knowledge entry",
    description: "An incoming knowledge entry is missing required fields or has invalid values",
  },
  FEDERATION_INVALID_DIRECTION: {
    domain: "federation",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid sync direction",
    description: "A sync must flow between two distinct repositories",
  },
  FEDERATION_CONFIGURATION_INVALID: {
    domain: "federation",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid federation configuration",
    description: "The federation configuration failed validation",
  },

  // ============================================================================
  // ROUTING ERRORS - Agent selection
  // ============================================================================
  ROUTER_NO_AGENT_AVAILABLE: {
    domain: "routing",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE" as const,
    baseType: "ExternalError" as const,
    isExpected: true,
    title: "No agent available",
    description: "The agent pool is empty or every agent is unavailable",
  },
  ROUTER_AGENT_NOT_FOUND: {
    domain: "routing",
    httpStatus: 404,
    grpcCode: "NOT_FOUND" as const,
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Agent not found",
    description: "The named agent is not part of the pool",
  },
  ROUTER_CONFIGURATION_INVALID: {
    domain: "routing",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid router configuration",
    description: "The agent router configuration failed validation",
  },

  // ============================================================================
  // ORCHESTRATION ERRORS - Solution log
  // ============================================================================
  ORCHESTRATION_CONFIGURATION_INVALID: {
    domain: "orchestration",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid orchestrator configuration",
    description: "The orchestrator configuration failed validation",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * gRPC canonical status codes used in the catalog
 */
export type GrpcStatusCode = ErrorCatalogEntry["grpcCode"];

/**
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
