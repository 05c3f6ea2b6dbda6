/**
 * Error taxonomy for the migration engine.
 *
 * Only ConnectivityError (at run start), RowDataBoundaryError and
 * InvalidTransitionError escape a batch; everything else is absorbed into an
 * object's terminal status.
 */
import type { ErrorKind, ObjectStatus } from "./types.js";

export type MigrationErrorCode =
  | "conversion_failed"
  | "deployment_failed"
  | "connectivity"
  | "persistence"
  | "timeout"
  | "row_data_boundary"
  | "cancelled"
  | "invalid_transition";

export class MigrationError extends Error {
  constructor(
    readonly code: MigrationErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConversionError extends MigrationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("conversion_failed", message, options);
  }
}

/** A failed deployment, already sanitized and classified. Stays inside RepairLoop. */
export class DeploymentError extends MigrationError {
  constructor(
    message: string,
    readonly kind: ErrorKind
  ) {
    super("deployment_failed", message);
  }
}

export class ConnectivityError extends MigrationError {
  constructor(
    readonly endpoint: "source" | "target",
    message: string,
    options?: { cause?: unknown }
  ) {
    super("connectivity", message, options);
  }
}

export class PersistenceError extends MigrationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("persistence", message, options);
  }
}

export class TimeoutError extends MigrationError {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super("timeout", `${operation} timed out after ${timeoutMs}ms`);
  }
}

export class RowDataBoundaryError extends MigrationError {
  constructor(objectName: string, detail: string) {
    super(
      "row_data_boundary",
      `Translator payload for ${objectName} carries row-level data (${detail})`
    );
  }
}

export class MigrationCancelledError extends MigrationError {
  constructor(message = "Migration run cancelled") {
    super("cancelled", message);
  }
}

export class InvalidTransitionError extends MigrationError {
  constructor(objectName: string, from: ObjectStatus, to: ObjectStatus) {
    super("invalid_transition", `Illegal status transition for ${objectName}: ${from} -> ${to}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
