import { TandemError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain, type GrpcStatusCode, type HttpStatusCode } from "./catalog.js";

/** Which side of the state document failed. */
export type PersistenceOperation = "read" | "write";

/**
 * A persisted state document could not be read or written.
 *
 * Surfaced to the caller; the in-memory state of the component that raised
 * it is left as it was when the failure happened.
 */
export class PersistenceError extends TandemError {
  readonly _tag = "ExternalError" as const;
  readonly code: "STATE_READ_FAILED" | "STATE_WRITE_FAILED";
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly path: string;
  readonly operation: PersistenceOperation;

  constructor(operation: PersistenceOperation, path: string, message: string, cause?: Error) {
    super(
      `Failed to ${operation} state document '${path}': ${message}`,
      { path, operation },
      undefined,
      ...(cause ? [{ cause }] : []),
    );
    this.code = operation === "read" ? "STATE_READ_FAILED" : "STATE_WRITE_FAILED";
    const entry = ERROR_CATALOG[this.code];
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.path = path;
    this.operation = operation;
  }
}
