import type { OutputFormat } from "../args.js";
import { JsonReporter } from "./json-reporter.js";
import { TextReporter } from "./text-reporter.js";
import type { StatusReporter } from "./types.js";

export { JsonReporter } from "./json-reporter.js";
export { TextReporter } from "./text-reporter.js";
export type { StatusReporter } from "./types.js";

export function getReporter(format: OutputFormat): StatusReporter {
  return format === "json" ? new JsonReporter() : new TextReporter();
}
