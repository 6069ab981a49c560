import { TandemError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain, type GrpcStatusCode, type HttpStatusCode } from "./catalog.js";

export class OrchestrationConfigurationInvalidError extends TandemError {
  readonly _tag = "ValidationError" as const;
  readonly code = "ORCHESTRATION_CONFIGURATION_INVALID" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(message: string) {
    super(`Invalid orchestrator configuration: ${message}`);
    const entry = ERROR_CATALOG.ORCHESTRATION_CONFIGURATION_INVALID;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
