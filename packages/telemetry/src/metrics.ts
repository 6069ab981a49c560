/**
 * OTel metrics for federation and routing.
 *
 * Lazily initialized: instruments are only created on first access.
 * When no meter provider is registered, these return no-op instruments.
 */

import type { Counter } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";

const METER_NAME = "tandem";

let _syncEvents: Counter | undefined;
let _routingDecisions: Counter | undefined;
let _solutions: Counter | undefined;
let _learningDropped: Counter | undefined;

/**
 * Counter of sync events registered by the ledger, by direction.
 */
export function getSyncEvents(): Counter {
  if (_syncEvents === undefined) {
    _syncEvents = metrics.getMeter(METER_NAME).createCounter("tandem.sync.events", {
      description: "Knowledge sync events registered",
    });
  }
  return _syncEvents;
}

/**
 * Counter of routing decisions, by agent and problem type.
 */
export function getRoutingDecisions(): Counter {
  if (_routingDecisions === undefined) {
    _routingDecisions = metrics.getMeter(METER_NAME).createCounter("tandem.routing.decisions", {
      description: "Problems routed to an agent",
    });
  }
  return _routingDecisions;
}

/**
 * Counter of recorded solutions, by status.
 */
export function getSolutions(): Counter {
  if (_solutions === undefined) {
    _solutions = metrics.getMeter(METER_NAME).createCounter("tandem.solutions", {
      description: "Solution records appended by the orchestrator",
    });
  }
  return _solutions;
}

/**
 * Counter of learning records dropped because a channel queue was full.
 */
export function getLearningDropped(): Counter {
  if (_learningDropped === undefined) {
    _learningDropped = metrics.getMeter(METER_NAME).createCounter("tandem.learning.dropped", {
      description: "Learning records dropped on a full queue",
    });
  }
  return _learningDropped;
}
