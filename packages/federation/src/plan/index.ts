export {
  type FederationResult,
  FederationService,
  type FederationServiceOptions,
} from "./federation-service.js";
export { type FederationPlan, planFederation, type ResolveFn } from "./plan-federation.js";
