import type { BaseErrorType, ErrorCode, ErrorDomain, GrpcStatusCode, HttpStatusCode } from "./catalog.js";

/**
 * JSON shape produced by `TandemError.toJSON()`.
 */
export interface ErrorJSON {
  readonly _tag: BaseErrorType;
  readonly code: ErrorCode;
  readonly message: string;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly timestamp: string;
  readonly metadata?: Record<string, string>;
  readonly traceId?: string;
}

/**
 * Root of the Tandem error hierarchy.
 *
 * Subclasses fill the catalog-derived fields (`code`, `httpStatus`,
 * `grpcCode`, `domain`, `isExpected`) from `ERROR_CATALOG` in their
 * constructor.
 */
export abstract class TandemError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;
  abstract readonly httpStatus: HttpStatusCode;
  abstract readonly grpcCode: GrpcStatusCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly timestamp: Date;
  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.timestamp = new Date();
    this.metadata = metadata;
    this.traceId = traceId;
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      grpcCode: this.grpcCode,
      domain: this.domain,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      ...(this.metadata !== undefined ? { metadata: this.metadata } : {}),
      ...(this.traceId !== undefined ? { traceId: this.traceId } : {}),
    };
  }
}

/** Check whether a value is a TandemError. */
export function isTandemError(error: unknown): error is TandemError {
  return error instanceof TandemError;
}
