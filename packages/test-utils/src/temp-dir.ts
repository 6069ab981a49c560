import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

/** Create a fresh directory under the OS tmpdir. */
export async function createTempDir(prefix = "tandem-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
