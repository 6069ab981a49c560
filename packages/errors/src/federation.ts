import { TandemError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain, type GrpcStatusCode, type HttpStatusCode } from "./catalog.js";

// ---------------------------------------------------------------------------
// Base class for all federation errors
// ---------------------------------------------------------------------------

/**
 * Abstract base class for federation errors.
 *
 * Enables generic catch: `if (e instanceof FederationError)`
 */
export abstract class FederationError extends TandemError {}

// ---------------------------------------------------------------------------
// Malformed import
// ---------------------------------------------------------------------------

export class MalformedImportError extends FederationError {
  readonly _tag = "ValidationError" as const;
  readonly code = "FEDERATION_MALFORMED_IMPORT" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  /** Position of the entry inside its batch or document. */
  readonly entryIndex: number;
  /** Entry id, when the entry carried a usable one. */
  readonly entryId: string | null;
  readonly issues: readonly string[];

  constructor(entryIndex: number, entryId: string | null, issues: readonly string[]) {
    super(
      `Malformed knowledge entry at index ${entryIndex}${entryId !== null ? ` ('${entryId}')` : ""}: ${issues.join("; ")}`,
    );
    const entry = ERROR_CATALOG.FEDERATION_MALFORMED_IMPORT;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.entryIndex = entryIndex;
    this.entryId = entryId;
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Invalid direction
// ---------------------------------------------------------------------------

export class FederationInvalidDirectionError extends FederationError {
  readonly _tag = "ValidationError" as const;
  readonly code = "FEDERATION_INVALID_DIRECTION" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string) {
    super(`Sync direction ${from} → ${to} is invalid: source and target must differ`);
    const entry = ERROR_CATALOG.FEDERATION_INVALID_DIRECTION;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.from = from;
    this.to = to;
  }
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export class FederationConfigurationInvalidError extends FederationError {
  readonly _tag = "ValidationError" as const;
  readonly code = "FEDERATION_CONFIGURATION_INVALID" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(message: string) {
    super(`Invalid federation configuration: ${message}`);
    const entry = ERROR_CATALOG.FEDERATION_CONFIGURATION_INVALID;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
