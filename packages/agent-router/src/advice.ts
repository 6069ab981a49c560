/**
 * Constrained advisory input for tie-breaking.
 *
 * The advisor is shown an enumerated candidate list and must answer with
 * one name from it. Anything else is discarded.
 */

import type { AgentDescriptor } from "@tandem/core";

export function buildTieBreakPrompt(
  problemType: string,
  description: string | undefined,
  candidates: readonly AgentDescriptor[],
): string {
  return [
    `Problem type: ${problemType}`,
    `Description: ${description ?? "(none)"}`,
    `Candidates: ${candidates.map((agent) => agent.name).join(", ")}`,
    "Reply with exactly one candidate name and nothing else.",
  ].join("\n");
}

/** The candidate the reply names, or undefined when it names none of them exactly. */
export function parseAdvice(
  reply: string,
  candidates: readonly AgentDescriptor[],
): AgentDescriptor | undefined {
  const name = reply.trim();
  return candidates.find((agent) => agent.name === name);
}
