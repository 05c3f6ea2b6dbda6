import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { errorMessage } from "./errors.js";
import type { Logger } from "../utils/logger.js";

/**
 * Run `fn` inside a fresh temporary directory that is removed afterwards,
 * whether `fn` succeeds or throws.
 */
export async function withTempDir<T>(
  prefix: string,
  logger: Logger,
  fn: (dir: string) => Promise<T>
): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  logger.debug({ dir }, "Created temp directory");
  try {
    return await fn(dir);
  } finally {
    try {
      await rm(dir, { recursive: true, force: true });
    } catch (error) {
      logger.error({ dir, error: errorMessage(error) }, "Failed to clean up temp directory");
    }
  }
}
