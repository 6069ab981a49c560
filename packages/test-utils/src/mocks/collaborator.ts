import type { KnowledgeCollaborator, LearningRecord } from "@tandem/core";
import { type Mock, vi } from "vitest";

/**
 * Collaborator whose three capabilities are Vitest mocks.
 * `query` and `chat` resolve to "" and `store` resolves, unless overridden.
 */
export interface MockCollaborator extends KnowledgeCollaborator {
  query: Mock<(text: string) => Promise<string>>;
  store: Mock<(record: LearningRecord) => Promise<void>>;
  chat: Mock<(message: string) => Promise<string>>;
}

export function createMockCollaborator(): MockCollaborator {
  return {
    query: vi.fn(async (_text: string) => ""),
    store: vi.fn(async (_record: LearningRecord) => {}),
    chat: vi.fn(async (_message: string) => ""),
  };
}
