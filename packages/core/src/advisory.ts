/**
 * Best-effort calls to the external collaborator.
 */

import { getErrorMessage } from "@tandem/errors";
import { logWarn } from "./log.js";

/** Default budget for a single advisory call. */
export const DEFAULT_ADVISORY_TIMEOUT_MS = 5_000;

/**
 * Race a promise against a timeout.
 * Returns the promise result or undefined on timeout.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T | undefined> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<undefined>((resolve) => {
        timer = setTimeout(() => resolve(undefined), ms);
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Options for `adviseSafely`: combines timeout, fallback, and labeling.
 */
export interface AdviseOptions<T> {
  /** Timeout in milliseconds */
  readonly timeoutMs: number;
  /** Fallback value returned on timeout or error */
  readonly fallback: T;
  /** Label for log messages (e.g., "agent-router:chat") */
  readonly label: string;
}

/**
 * Execute an advisory collaborator call with timeout, error handling, and a
 * typed fallback. Always returns `T`; failures are logged and degrade to
 * the fallback.
 */
export async function adviseSafely<T>(fn: () => Promise<T>, options: AdviseOptions<T>): Promise<T> {
  try {
    const result = await withTimeout(fn(), options.timeoutMs);
    if (result === undefined) {
      logWarn(options.label, `Call timed out after ${options.timeoutMs}ms`);
      return options.fallback;
    }
    return result;
  } catch (error) {
    logWarn(options.label, `Call failed: ${getErrorMessage(error)}`);
    return options.fallback;
  }
}
