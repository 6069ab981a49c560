export { LeastLoadedStrategy } from "./least-loaded.js";
export { PreferLocalStrategy } from "./prefer-local.js";
