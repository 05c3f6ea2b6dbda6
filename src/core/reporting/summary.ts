/** Batch summary: per-kind counts, failures with their reports, token usage. */
import type { UsageSummary } from "../llm/usage.js";
import {
  OBJECT_KINDS,
  qualifiedName,
  type ObjectKind,
  type ObjectRunResult,
  type UnresolvedReason,
} from "../types.js";

export interface KindCounts {
  migrated: number;
  failed: number;
}

export interface FailedObject {
  object: string;
  kind: ObjectKind;
  reason: UnresolvedReason;
  reportId?: string;
}

export interface BatchSummary {
  runId: string;
  total: number;
  migrated: number;
  failed: number;
  /** Objects never started because the run was cancelled. */
  skipped: number;
  cancelled: boolean;
  byKind: Record<ObjectKind, KindCounts>;
  failures: FailedObject[];
  usage: UsageSummary[];
  estimatedCost: number | null;
  durationMs: number;
}

function emptyCounts(): Record<ObjectKind, KindCounts> {
  return {
    Table: { migrated: 0, failed: 0 },
    Procedure: { migrated: 0, failed: 0 },
    Function: { migrated: 0, failed: 0 },
    Trigger: { migrated: 0, failed: 0 },
    PackageMember: { migrated: 0, failed: 0 },
  };
}

export function summarize(input: {
  runId: string;
  requested: number;
  results: readonly ObjectRunResult[];
  cancelled: boolean;
  usage: UsageSummary[];
  estimatedCost: number | null;
  durationMs: number;
}): BatchSummary {
  const byKind = emptyCounts();
  const failures: FailedObject[] = [];

  for (const result of input.results) {
    const counts = byKind[result.kind];
    if (result.status === "Deployed") {
      counts.migrated++;
    } else {
      counts.failed++;
      failures.push({
        object: qualifiedName(result.identity),
        kind: result.kind,
        reason: result.reason ?? "repair-exhausted",
        ...(result.reportId ? { reportId: result.reportId } : {}),
      });
    }
  }

  const migrated = input.results.filter((r) => r.status === "Deployed").length;
  return {
    runId: input.runId,
    total: input.requested,
    migrated,
    failed: input.results.length - migrated,
    skipped: input.requested - input.results.length,
    cancelled: input.cancelled,
    byKind,
    failures,
    usage: input.usage,
    estimatedCost: input.estimatedCost,
    durationMs: input.durationMs,
  };
}

/** Plain-text rendering for the console. */
export function formatSummary(summary: BatchSummary): string {
  const lines: string[] = [
    `Run ${summary.runId}${summary.cancelled ? " (cancelled)" : ""}`,
    `Objects: ${summary.total}  migrated: ${summary.migrated}  failed: ${summary.failed}  skipped: ${summary.skipped}`,
  ];

  for (const kind of OBJECT_KINDS) {
    const counts = summary.byKind[kind];
    if (counts.migrated + counts.failed === 0) continue;
    lines.push(`  ${kind}: ${counts.migrated} migrated, ${counts.failed} failed`);
  }

  if (summary.failures.length > 0) {
    lines.push("Unresolved:");
    for (const f of summary.failures) {
      lines.push(`  ${f.object} (${f.kind}) ${f.reason}${f.reportId ? ` -> ${f.reportId}` : ""}`);
    }
  }

  const tokens = summary.usage.reduce(
    (acc, u) => ({ input: acc.input + u.totalInputTokens, output: acc.output + u.totalOutputTokens }),
    { input: 0, output: 0 }
  );
  lines.push(
    `Translator tokens: ${tokens.input} in / ${tokens.output} out` +
      (summary.estimatedCost !== null ? `  (~$${summary.estimatedCost.toFixed(4)})` : "")
  );
  lines.push(`Duration: ${(summary.durationMs / 1000).toFixed(1)}s`);
  return lines.join("\n");
}
