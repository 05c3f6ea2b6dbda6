/**
 * Migration context using AsyncLocalStorage.
 * Propagates the run id and the object being processed through the async
 * call stack so every log line carries them.
 */
import { AsyncLocalStorage } from "node:async_hooks";
import type { ObjectKind } from "./types.js";

export interface MigrationContext {
  runId: string;
  object?: string;
  kind?: ObjectKind;
}

export const migrationContext = new AsyncLocalStorage<MigrationContext>();

export function withMigrationContext<T>(
  ctx: MigrationContext,
  fn: () => Promise<T>
): Promise<T> {
  return migrationContext.run(ctx, fn);
}

export function getCurrentContext(): MigrationContext | undefined {
  return migrationContext.getStore();
}
