import * as fs from "node:fs/promises";
import { describe, expect, it } from "vitest";
import {
  createMockCollaborator,
  createTempDir,
  FAKE_CLOCK_START,
  FakeClock,
  PACKAGE_NAME,
  removeTempDir,
} from "../index.js";

describe("@tandem/test-utils", () => {
  it("should export package name", () => {
    expect(PACKAGE_NAME).toBe("@tandem/test-utils");
  });
});

describe("FakeClock", () => {
  it("starts at the fixed instant and moves only when advanced", () => {
    const clock = new FakeClock();
    expect(clock.now()).toBe(FAKE_CLOCK_START);
    expect(clock.iso()).toBe("2026-01-01T00:00:00.000Z");

    clock.advance(1_500);
    expect(clock.iso()).toBe("2026-01-01T00:00:01.500Z");
  });
});

describe("createMockCollaborator", () => {
  it("resolves empty guidance by default and records calls", async () => {
    const collaborator = createMockCollaborator();

    expect(await collaborator.query("anything?")).toBe("");
    expect(await collaborator.chat("pick one")).toBe("");
    await collaborator.store({ query: "q", response: "r", category: "c", ttlDays: 1 });

    expect(collaborator.query).toHaveBeenCalledWith("anything?");
    expect(collaborator.store).toHaveBeenCalledTimes(1);
  });
});

describe("temp dirs", () => {
  it("creates and removes a directory", async () => {
    const dir = await createTempDir();
    expect((await fs.stat(dir)).isDirectory()).toBe(true);

    await removeTempDir(dir);
    await expect(fs.stat(dir)).rejects.toThrow();
  });
});
