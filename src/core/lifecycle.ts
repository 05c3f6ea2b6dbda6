/**
 * Object status state machine.
 *
 * States: New → Fetched → Converted → Reviewed → (Deployed | Repairing)
 * Repairing → (Deployed | Unresolved). Early failures go straight to Unresolved.
 */
import { InvalidTransitionError } from "./errors.js";
import { qualifiedName, type MigrationObject, type ObjectStatus } from "./types.js";

const TRANSITIONS: Readonly<Record<ObjectStatus, readonly ObjectStatus[]>> = {
  New: ["Fetched", "Unresolved"],
  Fetched: ["Converted", "Unresolved"],
  Converted: ["Reviewed", "Unresolved"],
  Reviewed: ["Deployed", "Repairing", "Unresolved"],
  Repairing: ["Deployed", "Unresolved"],
  Deployed: [],
  Unresolved: [],
};

export function isAllowedTransition(from: ObjectStatus, to: ObjectStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: ObjectStatus): status is "Deployed" | "Unresolved" {
  return status === "Deployed" || status === "Unresolved";
}

/** Move an object forward. Terminal objects are frozen afterwards. */
export function transition(object: MigrationObject, to: ObjectStatus): void {
  if (object.status === to) return;
  if (!isAllowedTransition(object.status, to)) {
    throw new InvalidTransitionError(qualifiedName(object.identity), object.status, to);
  }
  object.status = to;
  if (isTerminal(to)) {
    Object.freeze(object.identity);
    Object.freeze(object);
  }
}

export function createMigrationObject(
  init: Pick<MigrationObject, "identity" | "kind"> & { packageName?: string }
): MigrationObject {
  return {
    identity: { ...init.identity },
    kind: init.kind,
    ...(init.packageName ? { packageName: init.packageName } : {}),
    sourceText: null,
    targetText: null,
    status: "New",
  };
}
