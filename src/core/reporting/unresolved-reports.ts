/**
 * One JSON report per object that ends Unresolved, written atomically as
 * `<name>_<yyyyMMdd_HHmmss>.json` in the configured directory.
 */
import { access, mkdir, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { PersistenceError, errorMessage } from "../errors.js";
import type { SharedMemoryStore } from "../memory/shared-memory-store.js";
import { buildSignature } from "../repair/signature.js";
import type {
  DeploymentAttempt,
  ErrorKind,
  MemoryContextSnapshot,
  MigrationObject,
  UnresolvedReason,
  UnresolvedReport,
} from "../types.js";
import { formatReportStamp } from "../../utils/id.js";
import type { Logger } from "../../utils/logger.js";

export interface UnresolvedReportInput {
  object: MigrationObject;
  reason: UnresolvedReason;
  attempts: readonly DeploymentAttempt[];
  finalError: string;
}

export interface UnresolvedReportWriterOptions {
  dir: string;
  memory: SharedMemoryStore;
  logger: Logger;
  maxAttempts: number;
  targetSchema: string;
  now?: () => Date;
}

const RECENT_PATTERN_LIMIT = 3;

function safeFileName(name: string): string {
  return name.replace(/[^\w.$#-]/g, "_");
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export class UnresolvedReportWriter {
  private readonly now: () => Date;

  constructor(private options: UnresolvedReportWriterOptions) {
    this.now = options.now ?? (() => new Date());
  }

  build(input: UnresolvedReportInput): UnresolvedReport {
    const { object, reason, attempts, finalError } = input;
    const createdAt = this.now();
    const lastKind = attempts.at(-1)?.errorKind ?? null;

    const report: UnresolvedReport = {
      id: `${safeFileName(object.identity.name)}_${formatReportStamp(createdAt)}`,
      identity: Object.freeze({ ...object.identity }),
      kind: object.kind,
      reason,
      attempts: Object.freeze([...attempts]),
      finalError,
      lastTargetText: object.targetText,
      memoryContext: Object.freeze(this.memoryContext(object, lastKind, finalError)),
      recommendations: Object.freeze(this.recommendations(object, reason, lastKind)),
      createdAt: createdAt.toISOString(),
    };
    return Object.freeze(report);
  }

  /** Returns the id the report was stored under. Throws PersistenceError. */
  async write(report: UnresolvedReport): Promise<string> {
    const { dir, logger } = this.options;
    try {
      await mkdir(dir, { recursive: true });

      let id = report.id;
      for (let n = 2; await exists(join(dir, `${id}.json`)); n++) {
        id = `${report.id}_${n}`;
      }

      const target = join(dir, `${id}.json`);
      const tmp = join(dir, `.${id}.json.${process.pid}.tmp`);
      await writeFile(tmp, JSON.stringify({ ...report, id }, null, 2), "utf-8");
      await rename(tmp, target);
      logger.info({ reportId: id }, "Unresolved report written");
      return id;
    } catch (err) {
      throw new PersistenceError(`Cannot write unresolved report ${report.id}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  private memoryContext(
    object: MigrationObject,
    lastKind: ErrorKind | null,
    finalError: string
  ): MemoryContextSnapshot {
    const { memory } = this.options;
    const name = object.identity.name;
    const recent = [
      ...memory.getPatterns(object.kind, "success", RECENT_PATTERN_LIMIT),
      ...memory.getPatterns(object.kind, "failure", RECENT_PATTERN_LIMIT),
    ];
    return {
      identityColumns: memory.getIdentityColumns(name),
      tableMapping: memory.getTableMapping(name) ?? null,
      recentPatterns: recent.map((p) => ({
        objectName: p.objectName,
        outcome: p.outcome,
        fixSummary: p.fixSummary,
      })),
      knownSolutions: lastKind
        ? memory.countSolutions(buildSignature(object.kind, lastKind, finalError))
        : 0,
    };
  }

  private recommendations(
    object: MigrationObject,
    reason: UnresolvedReason,
    lastKind: ErrorKind | null
  ): string[] {
    const recs: string[] = [];

    switch (reason) {
      case "fetch-failed":
        recs.push(`Verify that ${object.identity.schema}.${object.identity.name} exists in the source export`);
        break;
      case "conversion-failed":
        recs.push("Check the converter diagnostics and translator availability, or convert the object by hand");
        break;
      case "translator-failed":
        recs.push("Check the LLM provider configuration and API key, then rerun the object");
        break;
      case "repair-exhausted":
        recs.push(
          `Fix the object by hand or raise migration.max_attempts (currently ${this.options.maxAttempts})`
        );
        break;
    }

    switch (lastKind) {
      case "identity-column":
        recs.push("Insert into identity columns with OVERRIDING SYSTEM VALUE or declare them GENERATED BY DEFAULT");
        break;
      case "missing-object":
        recs.push("Deploy referenced objects first: tables before dependent code, packages before their members");
        break;
      case "type-mismatch":
        recs.push("Review the data type mapping (NUMBER, DATE, VARCHAR2) of the columns named in the error");
        break;
      case "permission":
        recs.push(`Grant the deployment role CREATE and USAGE on schema ${this.options.targetSchema}`);
        break;
      case "syntax":
        recs.push("Look for dialect constructs the conversion left behind in the last attempted text");
        break;
      case "timeout":
        recs.push("Raise timeouts.deploy_ms or deploy when the target is less busy");
        break;
      case "unknown":
        recs.push("Inspect the final error and the last attempted text");
        break;
      case null:
        break;
    }

    return recs;
  }
}
