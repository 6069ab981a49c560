export const PACKAGE_NAME = "@tandem/test-utils" as const;

export { FAKE_CLOCK_START, FakeClock } from "./fake-clock.js";
export { createMockCollaborator, type MockCollaborator } from "./mocks/collaborator.js";
export { createTempDir, removeTempDir } from "./temp-dir.js";
