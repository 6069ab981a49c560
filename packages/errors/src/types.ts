/**
 * Type infrastructure shared by the error classes.
 */

import type { ErrorCode } from "./catalog.js";

/**
 * Options for constructing a catalogued error.
 * The code determines httpStatus, grpcCode, domain, and isExpected via catalog lookup.
 */
export interface TandemErrorOptions<C extends ErrorCode> {
  code: C;
  message: string;
  metadata?: Record<string, string> | undefined;
  traceId?: string | undefined;
  cause?: Error | undefined;
}
