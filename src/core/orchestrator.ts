import type {
  CodeReviewer,
  DeploymentExecutor,
  MetadataRefresher,
  SourceCatalog,
} from "./collaborators.js";
import type { ConversionRouter } from "./conversion/conversion-router.js";
import type { SharedMemoryStore } from "./memory/shared-memory-store.js";
import type { RepairLoop } from "./repair/repair-loop.js";
import type { UnresolvedReportWriter } from "./reporting/unresolved-reports.js";
import type { UsageTracker } from "./llm/usage.js";
import type { Logger } from "../utils/logger.js";
import { rewriteSchemaQualifiers } from "./conversion/schema-rewriter.js";
import { withMigrationContext } from "./correlation.js";
import {
  ConnectivityError,
  InvalidTransitionError,
  MigrationCancelledError,
  RowDataBoundaryError,
  errorMessage,
} from "./errors.js";
import { transition } from "./lifecycle.js";
import { ResilientExecutor, withTimeout } from "./resilient-executor.js";
import { summarize, type BatchSummary } from "./reporting/summary.js";
import {
  qualifiedName,
  type DeploymentAttempt,
  type MigrationObject,
  type ObjectRunResult,
  type UnresolvedReason,
} from "./types.js";
import { generateRunId } from "../utils/id.js";
import { firstLine, truncate } from "../utils/text.js";

export interface OrchestratorSettings {
  flushEvery: number;
  targetSchema: string;
  sourceSchemas: readonly string[];
  reviewEnabled: boolean;
}

export interface OrchestratorTimeouts {
  fetchMs: number;
  reviewMs: number;
  metadataMs: number;
  pingMs: number;
}

export interface OrchestratorDeps {
  source: SourceCatalog;
  router: ConversionRouter;
  repairLoop: RepairLoop;
  deployer: DeploymentExecutor;
  memory: SharedMemoryStore;
  reports: UnresolvedReportWriter;
  logger: Logger;
  metadata?: MetadataRefresher;
  reviewer?: CodeReviewer;
  usage?: UsageTracker;
  settings?: Partial<OrchestratorSettings>;
  timeouts?: Partial<OrchestratorTimeouts>;
  runId?: string;
  now?: () => Date;
}

const DEFAULT_SETTINGS: OrchestratorSettings = {
  flushEvery: 1,
  targetSchema: "public",
  sourceSchemas: [],
  reviewEnabled: true,
};

const DEFAULT_TIMEOUTS: OrchestratorTimeouts = {
  fetchMs: 30_000,
  reviewMs: 60_000,
  metadataMs: 30_000,
  pingMs: 15_000,
};

/** Errors that are bugs or run-level events rather than object failures. */
function isFatal(err: unknown): boolean {
  return (
    err instanceof RowDataBoundaryError ||
    err instanceof InvalidTransitionError ||
    err instanceof MigrationCancelledError
  );
}

/**
 * Sequences fetch → convert → review → deploy/repair → metadata refresh →
 * memory update → unresolved report, one object at a time.
 */
export class Orchestrator {
  readonly runId: string;
  private readonly settings: OrchestratorSettings;
  private readonly timeouts: OrchestratorTimeouts;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private processedSinceFlush = 0;

  constructor(private deps: OrchestratorDeps) {
    this.runId = deps.runId ?? generateRunId();
    this.settings = { ...DEFAULT_SETTINGS, ...deps.settings };
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...deps.timeouts };
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  /** Throws ConnectivityError when the source or the target is unreachable. */
  async checkConnectivity(): Promise<void> {
    try {
      await withTimeout(() => this.deps.source.ping(), this.timeouts.pingMs, "source ping");
    } catch (err) {
      throw new ConnectivityError("source", `Source unreachable: ${errorMessage(err)}`, { cause: err });
    }
    try {
      await withTimeout(() => this.deps.deployer.ping(), this.timeouts.pingMs, "target ping");
    } catch (err) {
      throw new ConnectivityError("target", `Target unreachable: ${errorMessage(err)}`, { cause: err });
    }
  }

  async runBatch(
    objects: readonly MigrationObject[],
    options: { signal?: AbortSignal } = {}
  ): Promise<BatchSummary> {
    const { signal } = options;
    const started = Date.now();
    await this.checkConnectivity();
    this.logger.info({ runId: this.runId, objects: objects.length }, "Migration batch started");

    const results: ObjectRunResult[] = [];
    let cancelled = false;

    try {
      for (const object of objects) {
        if (signal?.aborted) {
          cancelled = true;
          break;
        }
        try {
          results.push(await this.run(object, signal));
        } catch (err) {
          if (err instanceof MigrationCancelledError) {
            cancelled = true;
            break;
          }
          throw err;
        }
      }
    } finally {
      await this.deps.memory.persist();
    }

    const summary = summarize({
      runId: this.runId,
      requested: objects.length,
      results,
      cancelled,
      usage: this.deps.usage?.getSummary() ?? [],
      estimatedCost: this.deps.usage?.getTotalCost() ?? null,
      durationMs: Date.now() - started,
    });
    this.logger.info(
      { runId: this.runId, migrated: summary.migrated, failed: summary.failed, cancelled },
      "Migration batch finished"
    );
    return summary;
  }

  /**
   * Migrate one object. Object-level failures end in Unresolved and never
   * throw; cancellation and boundary bugs do.
   */
  async run(object: MigrationObject, signal?: AbortSignal): Promise<ObjectRunResult> {
    return withMigrationContext(
      { runId: this.runId, object: qualifiedName(object.identity), kind: object.kind },
      async () => {
        const result = await this.process(object, signal);
        await this.maybeFlush();
        return result;
      }
    );
  }

  private async process(object: MigrationObject, signal?: AbortSignal): Promise<ObjectRunResult> {
    const { source, router, repairLoop, deployer } = this.deps;
    this.logger.info("Object migration started");

    // Fetch
    try {
      const text = await ResilientExecutor.execute(
        () =>
          source.fetchDefinition(
            {
              identity: object.identity,
              kind: object.kind,
              ...(object.packageName ? { packageName: object.packageName } : {}),
            },
            signal
          ),
        { timeout: this.timeouts.fetchMs, retries: 1, operation: "source fetch" },
        this.logger
      );
      object.sourceText = text;
      transition(object, "Fetched");
    } catch (err) {
      this.rethrowIfFatal(err, signal);
      return this.fail(object, "fetch-failed", `Fetch failed: ${errorMessage(err)}`);
    }

    // Convert
    let converted: string;
    try {
      const result = await router.convert(object, signal);
      converted = rewriteSchemaQualifiers(
        result.text,
        this.settings.sourceSchemas,
        this.settings.targetSchema
      );
      object.targetText = converted;
      transition(object, "Converted");
      this.logger.info({ tool: result.tool, warnings: result.warningCount }, "Object converted");
    } catch (err) {
      this.rethrowIfFatal(err, signal);
      return this.fail(object, "conversion-failed", `Conversion failed: ${errorMessage(err)}`);
    }

    // Review (advisory)
    const note = await this.review(object, converted, signal);
    transition(object, "Reviewed");

    // Deploy and repair
    const outcome = await repairLoop.repair(
      object,
      converted,
      (text, s) => deployer.deploy(text, s),
      { signal, ...(note ? { note } : {}) }
    );

    if (outcome.status === "Deployed") {
      await this.refreshMetadata(object);
      return {
        identity: object.identity,
        kind: object.kind,
        status: "Deployed",
        attempts: outcome.attempts,
      };
    }

    const reason = outcome.reason ?? "repair-exhausted";
    const reportId = await this.writeReport(object, reason, outcome.attempts, outcome.finalError ?? "");
    return {
      identity: object.identity,
      kind: object.kind,
      status: "Unresolved",
      attempts: outcome.attempts,
      reason,
      ...(reportId ? { reportId } : {}),
    };
  }

  private async review(object: MigrationObject, targetText: string, signal?: AbortSignal): Promise<string | undefined> {
    const reviewer = this.deps.reviewer;
    if (!reviewer || !this.settings.reviewEnabled) return undefined;
    try {
      const review = await withTimeout(
        () =>
          reviewer.review(
            {
              objectName: object.identity.name,
              kind: object.kind,
              sourceText: object.sourceText ?? "",
              targetText,
            },
            signal
          ),
        this.timeouts.reviewMs,
        "review"
      );
      this.logger.info({ grade: review.grade, issues: review.issues.length }, "Review finished");
      return `review ${review.grade}`;
    } catch (err) {
      if (signal?.aborted) throw new MigrationCancelledError();
      this.logger.warn({ error: errorMessage(err) }, "Review failed, continuing without it");
      return undefined;
    }
  }

  /** Merge the deployed object's description into memory. Failures are logged only. */
  private async refreshMetadata(object: MigrationObject): Promise<void> {
    const metadata = this.deps.metadata;
    if (!metadata) return;
    const { memory } = this.deps;
    try {
      const description = await withTimeout(
        () => metadata.describe(object.identity, object.kind),
        this.timeouts.metadataMs,
        "metadata refresh"
      );
      if (!description) {
        this.logger.debug("No metadata returned for deployed object");
        return;
      }
      memory.upsertSchema(description.database, description.schema, true);
      const identityColumns = description.columns.filter((c) => c.isIdentity).map((c) => c.name);
      if (identityColumns.length > 0) {
        memory.upsertIdentityColumns(object.identity.name, identityColumns);
      }
      memory.upsertTableMapping(object.identity.name, {
        targetSchema: description.schema,
        targetName: description.name,
      });
    } catch (err) {
      this.logger.warn({ error: errorMessage(err) }, "Metadata refresh failed");
    }
  }

  /** Early failure before any deployment attempt. */
  private async fail(
    object: MigrationObject,
    reason: UnresolvedReason,
    message: string
  ): Promise<ObjectRunResult> {
    this.logger.warn({ reason, error: truncate(message, 300) }, "Object unresolved");
    transition(object, "Unresolved");
    this.deps.memory.appendPattern({
      kind: object.kind,
      objectName: object.identity.name,
      outcome: "failure",
      fixSummary: truncate(`${reason}: ${firstLine(message)}`, 300),
      timestamp: this.now().toISOString(),
    });
    const reportId = await this.writeReport(object, reason, [], message);
    return {
      identity: object.identity,
      kind: object.kind,
      status: "Unresolved",
      attempts: Object.freeze([]),
      reason,
      ...(reportId ? { reportId } : {}),
    };
  }

  private async writeReport(
    object: MigrationObject,
    reason: UnresolvedReason,
    attempts: readonly DeploymentAttempt[],
    finalError: string
  ): Promise<string | undefined> {
    const { reports } = this.deps;
    const report = reports.build({ object, reason, attempts, finalError });
    try {
      return await reports.write(report);
    } catch (err) {
      this.logger.error({ error: err, reportId: report.id }, "Failed to persist unresolved report");
      return undefined;
    }
  }

  private async maybeFlush(): Promise<void> {
    this.processedSinceFlush++;
    if (this.processedSinceFlush >= this.settings.flushEvery) {
      this.processedSinceFlush = 0;
      await this.deps.memory.persist();
    }
  }

  private rethrowIfFatal(err: unknown, signal?: AbortSignal): void {
    if (isFatal(err)) throw err;
    if (signal?.aborted) throw new MigrationCancelledError();
  }
}
