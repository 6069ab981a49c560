import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { getErrorMessage, PersistenceError } from "@tandem/errors";
import type { z } from "zod";
import { logWarn } from "./log.js";

/** Number of records kept in a persisted history. */
export const DEFAULT_RETENTION = 100;

/** The most recent `limit` items, in their original order. */
export function retainLast<T>(items: readonly T[], limit: number): readonly T[] {
  return items.length > limit ? items.slice(items.length - limit) : items;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * A JSON state document on disk, validated on read and replaced atomically
 * on write (temp file in the same directory, then rename).
 */
export class JsonStateFile<T> {
  readonly path: string;
  private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;

  constructor(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
    this.path = filePath;
    this.schema = schema;
  }

  /**
   * Read and validate the document. Returns null when the file does not exist.
   *
   * @throws {PersistenceError} if the file is unreadable, not JSON, or fails validation.
   */
  async read(): Promise<T | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.path, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw new PersistenceError(
        "read",
        this.path,
        getErrorMessage(error),
        error instanceof Error ? error : undefined,
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError(
        "read",
        this.path,
        `invalid JSON: ${getErrorMessage(error)}`,
        error instanceof Error ? error : undefined,
      );
    }

    const result = this.schema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new PersistenceError("read", this.path, `invalid document: ${issues}`, result.error);
    }
    return result.data;
  }

  /**
   * Replace the document.
   *
   * @throws {PersistenceError} if the document cannot be written.
   */
  async write(document: T): Promise<void> {
    const dir = path.dirname(this.path);
    const tmpPath = path.join(dir, `.${path.basename(this.path)}.${randomUUID()}.tmp`);
    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(tmpPath, `${JSON.stringify(document, null, 2)}\n`, "utf-8");
      await fs.rename(tmpPath, this.path);
    } catch (error) {
      await this.discard(tmpPath);
      throw new PersistenceError(
        "write",
        this.path,
        getErrorMessage(error),
        error instanceof Error ? error : undefined,
      );
    }
  }

  private async discard(tmpPath: string): Promise<void> {
    try {
      await fs.rm(tmpPath, { force: true });
    } catch (error) {
      logWarn("state-file", `Could not remove temp file ${tmpPath}: ${getErrorMessage(error)}`);
    }
  }
}
