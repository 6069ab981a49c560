import { TandemError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain, type GrpcStatusCode, type HttpStatusCode } from "./catalog.js";

/**
 * Abstract base class for agent routing errors.
 */
export abstract class RoutingError extends TandemError {}

// ---------------------------------------------------------------------------
// No agent available
// ---------------------------------------------------------------------------

/**
 * Raised when routing cannot proceed. There is no default agent to fall
 * back on; callers must handle it.
 */
export class NoAgentAvailableError extends RoutingError {
  readonly _tag = "ExternalError" as const;
  readonly code = "ROUTER_NO_AGENT_AVAILABLE" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly problemType: string;
  readonly poolSize: number;

  constructor(problemType: string, poolSize: number) {
    super(
      poolSize === 0
        ? `No agent available for '${problemType}': the agent pool is empty`
        : `No agent available for '${problemType}': all ${poolSize} agents are unavailable`,
    );
    const entry = ERROR_CATALOG.ROUTER_NO_AGENT_AVAILABLE;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.problemType = problemType;
    this.poolSize = poolSize;
  }
}

// ---------------------------------------------------------------------------
// Agent not found
// ---------------------------------------------------------------------------

export class AgentNotFoundError extends RoutingError {
  readonly _tag = "NotFoundError" as const;
  readonly code = "ROUTER_AGENT_NOT_FOUND" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly agentName: string;

  constructor(agentName: string) {
    super(`Agent '${agentName}' is not part of the pool`);
    const entry = ERROR_CATALOG.ROUTER_AGENT_NOT_FOUND;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.agentName = agentName;
  }
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export class RouterConfigurationInvalidError extends RoutingError {
  readonly _tag = "ValidationError" as const;
  readonly code = "ROUTER_CONFIGURATION_INVALID" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(message: string) {
    super(`Invalid router configuration: ${message}`);
    const entry = ERROR_CATALOG.ROUTER_CONFIGURATION_INVALID;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
