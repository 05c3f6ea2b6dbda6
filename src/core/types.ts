/** Domain types shared by the orchestration engine and its collaborators. */

export const OBJECT_KINDS = [
  "Table",
  "Procedure",
  "Function",
  "Trigger",
  "PackageMember",
] as const;

export type ObjectKind = (typeof OBJECT_KINDS)[number];

export type ObjectStatus =
  | "New"
  | "Fetched"
  | "Converted"
  | "Reviewed"
  | "Deployed"
  | "Repairing"
  | "Unresolved";

export type TerminalStatus = "Deployed" | "Unresolved";

export type ErrorKind =
  | "identity-column"
  | "missing-object"
  | "type-mismatch"
  | "permission"
  | "syntax"
  | "timeout"
  | "unknown";

export interface ObjectIdentity {
  name: string;
  schema: string;
}

export interface MigrationObject {
  identity: ObjectIdentity;
  kind: ObjectKind;
  /** Parent package for PackageMember objects. */
  packageName?: string;
  sourceText: string | null;
  targetText: string | null;
  status: ObjectStatus;
}

export type ConversionTool = "primary" | "fallback";

export interface ConversionResult {
  readonly tool: ConversionTool;
  readonly text: string;
  readonly errorCount: number;
  readonly warningCount: number;
  readonly diagnostics: readonly string[];
}

export interface DeploymentAttempt {
  readonly index: number;
  readonly error: string | null;
  readonly errorKind: ErrorKind | null;
  readonly fixText: string | null;
  readonly outcome: "Success" | "Failed";
  readonly timestamp: string;
}

export type SolutionProvenance = "memory" | "web-search" | "translator";

export interface ErrorSolution {
  signature: string;
  solution: string;
  provenance: SolutionProvenance;
  recordedAt: string;
}

export type PatternOutcome = "success" | "failure";

export interface Pattern {
  kind: ObjectKind;
  objectName: string;
  outcome: PatternOutcome;
  fixSummary: string;
  timestamp: string;
}

export interface ColumnDescription {
  name: string;
  dataType: string;
  nullable: boolean;
  isIdentity: boolean;
}

/** Structured description of a deployed object, as returned by metadata refresh. */
export interface ObjectDescription {
  database: string;
  schema: string;
  name: string;
  columns: ColumnDescription[];
  constraints: string[];
}

export type UnresolvedReason =
  | "repair-exhausted"
  | "fetch-failed"
  | "conversion-failed"
  | "translator-failed";

export interface MemoryContextSnapshot {
  identityColumns: string[];
  tableMapping: { targetSchema: string; targetName: string } | null;
  recentPatterns: Array<Pick<Pattern, "objectName" | "outcome" | "fixSummary">>;
  knownSolutions: number;
}

export interface UnresolvedReport {
  readonly id: string;
  readonly identity: ObjectIdentity;
  readonly kind: ObjectKind;
  readonly reason: UnresolvedReason;
  readonly attempts: readonly DeploymentAttempt[];
  readonly finalError: string;
  readonly lastTargetText: string | null;
  readonly memoryContext: MemoryContextSnapshot;
  readonly recommendations: readonly string[];
  readonly createdAt: string;
}

export interface ObjectRunResult {
  identity: ObjectIdentity;
  kind: ObjectKind;
  status: TerminalStatus;
  attempts: readonly DeploymentAttempt[];
  reason?: UnresolvedReason;
  reportId?: string;
}

export function qualifiedName(identity: ObjectIdentity): string {
  return `${identity.schema}.${identity.name}`;
}
