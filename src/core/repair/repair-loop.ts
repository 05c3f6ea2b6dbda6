/**
 * Bounded deploy → classify → fix → redeploy loop for one object.
 *
 * Each failed attempt is classified and signed. Known solutions for the
 * signature come from memory; when there are none, web search runs once per
 * distinct signature for the object. The translator gets everything as a
 * repair request and its patch becomes the next attempt's text. The last
 * permitted attempt does not ask for a patch.
 */
import type {
  DeployOutcome,
  FallbackTranslator,
  SearchHit,
  TranslationRequest,
  WebSearch,
} from "../collaborators.js";
import { assertNoRowData } from "../conversion/row-data-guard.js";
import {
  DeploymentError,
  MigrationCancelledError,
  RowDataBoundaryError,
  TimeoutError,
  errorMessage,
} from "../errors.js";
import { transition } from "../lifecycle.js";
import type { SharedMemoryStore } from "../memory/shared-memory-store.js";
import { withTimeout } from "../resilient-executor.js";
import type {
  DeploymentAttempt,
  ErrorKind,
  MigrationObject,
  UnresolvedReason,
} from "../types.js";
import { firstLine, truncate } from "../../utils/text.js";
import type { Logger } from "../../utils/logger.js";
import { ErrorClassifier } from "./error-classifier.js";
import { buildSignature, normalizeErrorText, sanitizeErrorText } from "./signature.js";

export type DeployFn = (text: string, signal?: AbortSignal) => Promise<DeployOutcome>;

export interface RepairLoopOptions {
  translator: FallbackTranslator;
  memory: SharedMemoryStore;
  logger: Logger;
  classifier?: ErrorClassifier;
  search?: WebSearch;
  maxAttempts?: number;
  memoryHitLimit?: number;
  deployTimeoutMs?: number;
  translateTimeoutMs?: number;
  searchTimeoutMs?: number;
  now?: () => Date;
}

export interface RepairRunOptions {
  signal?: AbortSignal;
  /** Appended to the success pattern's fix summary (e.g. the review grade). */
  note?: string;
}

export interface RepairOutcome {
  status: "Deployed" | "Unresolved";
  attempts: readonly DeploymentAttempt[];
  reason?: Extract<UnresolvedReason, "repair-exhausted" | "translator-failed">;
  finalError?: string;
}

interface AppliedFix {
  fix: string;
  signature: string;
  hadMemoryHit: boolean;
  usedSearch: boolean;
}

const SOLUTION_TEXT_LIMIT = 4_000;

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new MigrationCancelledError();
}

/** Settle with `promise`, or reject with MigrationCancelledError as soon as `signal` aborts. */
function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new MigrationCancelledError());

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(new MigrationCancelledError());
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return Promise.race([promise, aborted]).finally(() => {
    if (onAbort) signal.removeEventListener("abort", onAbort);
  });
}

export class RepairLoop {
  readonly maxAttempts: number;
  private readonly classifier: ErrorClassifier;
  private readonly memoryHitLimit: number;
  private readonly deployTimeoutMs: number;
  private readonly translateTimeoutMs: number;
  private readonly searchTimeoutMs: number;
  private readonly now: () => Date;

  constructor(private options: RepairLoopOptions) {
    const maxAttempts = options.maxAttempts ?? 3;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1 || maxAttempts > 10) {
      throw new RangeError(`maxAttempts must be an integer between 1 and 10 (got ${maxAttempts})`);
    }
    this.maxAttempts = maxAttempts;
    this.classifier = options.classifier ?? new ErrorClassifier();
    this.memoryHitLimit = options.memoryHitLimit ?? 5;
    this.deployTimeoutMs = options.deployTimeoutMs ?? 60_000;
    this.translateTimeoutMs = options.translateTimeoutMs ?? 180_000;
    this.searchTimeoutMs = options.searchTimeoutMs ?? 15_000;
    this.now = options.now ?? (() => new Date());
  }

  async repair(
    object: MigrationObject,
    convertedText: string,
    deployFn: DeployFn,
    runOptions: RepairRunOptions = {}
  ): Promise<RepairOutcome> {
    const { signal } = runOptions;
    const { memory, logger } = this.options;
    const attempts: DeploymentAttempt[] = [];
    const searchedSignatures = new Set<string>();
    const previousErrors: string[] = [];
    const kindsSeen: ErrorKind[] = [];
    let current = convertedText;
    let lastFix: AppliedFix | null = null;
    let reason: RepairOutcome["reason"] = "repair-exhausted";
    let finalError = "";

    object.targetText = current;

    for (let index = 1; index <= this.maxAttempts; index++) {
      throwIfAborted(signal);
      const failure = await this.deployOnce(current, deployFn, signal);
      // An attempt interrupted by cancellation is discarded, not recorded.
      throwIfAborted(signal);

      if (!failure) {
        attempts.push(this.attempt(index, null, null, null, "Success"));
        transition(object, "Deployed");
        logger.info({ attempt: index }, "Deployment succeeded");
        this.recordSuccess(object, index, kindsSeen, lastFix, runOptions.note);
        return { status: "Deployed", attempts: Object.freeze(attempts) };
      }

      const rawError = failure.message;
      const errorKind = failure.kind;
      const signature = buildSignature(object.kind, errorKind, rawError);
      kindsSeen.push(errorKind);
      finalError = rawError;
      transition(object, "Repairing");
      logger.warn({ attempt: index, errorKind, error: truncate(rawError, 300) }, "Deployment failed");

      if (index === this.maxAttempts) {
        attempts.push(this.attempt(index, rawError, errorKind, null, "Failed"));
        break;
      }

      const memoryHits = memory.getSolutions(signature, this.memoryHitLimit);
      let searchHits: SearchHit[] = [];
      if (memoryHits.length === 0 && !searchedSignatures.has(signature)) {
        searchedSignatures.add(signature);
        searchHits = await this.searchOnce(rawError, object, signal);
      }

      const request: TranslationRequest = {
        objectName: object.identity.name,
        kind: object.kind,
        sourceText: object.sourceText ?? "",
        patterns: [],
        repair: {
          currentText: current,
          rawError,
          errorKind,
          memoryHits,
          searchHits,
          previousErrors: [...previousErrors],
          identityColumns: memory.getIdentityColumns(object.identity.name),
        },
      };
      assertNoRowData(request);

      let fix: string;
      try {
        fix = await withTimeout(
          () => raceAbort(this.options.translator.translate(request, signal), signal),
          this.translateTimeoutMs,
          "repair translation"
        );
      } catch (err) {
        if (err instanceof MigrationCancelledError || signal?.aborted) {
          throw err instanceof MigrationCancelledError ? err : new MigrationCancelledError();
        }
        if (err instanceof RowDataBoundaryError) throw err;
        attempts.push(this.attempt(index, rawError, errorKind, null, "Failed"));
        reason = "translator-failed";
        logger.error({ attempt: index, error: errorMessage(err) }, "Translator failed during repair");
        break;
      }

      attempts.push(this.attempt(index, rawError, errorKind, fix, "Failed"));
      previousErrors.push(rawError);
      lastFix = {
        fix,
        signature,
        hadMemoryHit: memoryHits.length > 0,
        usedSearch: searchHits.length > 0,
      };
      current = fix;
      object.targetText = fix;
    }

    transition(object, "Unresolved");
    memory.appendPattern({
      kind: object.kind,
      objectName: object.identity.name,
      outcome: "failure",
      fixSummary: truncate(
        `unresolved after ${attempts.length} attempt(s) [${kindsSeen.join(" -> ")}]: ${firstLine(finalError)}`,
        300
      ),
      timestamp: this.now().toISOString(),
    });
    logger.warn({ attempts: attempts.length, reason }, "Object unresolved");
    return { status: "Unresolved", attempts: Object.freeze(attempts), reason, finalError };
  }

  /**
   * Resolves to undefined on success, or to the classified failure.
   *
   * Each attempt gets its own signal, aborted when the run is cancelled or the
   * deploy times out. After a timeout the abandoned deploy is awaited before
   * the next attempt starts, so two deploys never overlap. A deploy that still
   * commits after its timeout counts as a success.
   */
  private async deployOnce(
    text: string,
    deployFn: DeployFn,
    signal?: AbortSignal
  ): Promise<DeploymentError | undefined> {
    const attempt = new AbortController();
    const onRunAbort = () => attempt.abort();
    signal?.addEventListener("abort", onRunAbort, { once: true });
    const pending = (async () => deployFn(text, attempt.signal))();

    try {
      const outcome = await withTimeout(
        () => raceAbort(pending, signal),
        this.deployTimeoutMs,
        "deployment"
      );
      return this.toFailure(outcome);
    } catch (err) {
      if (err instanceof MigrationCancelledError) throw err;
      if (!(err instanceof TimeoutError)) {
        const rawError = sanitizeErrorText(errorMessage(err));
        return new DeploymentError(rawError, this.classifier.classify(rawError));
      }

      attempt.abort();
      const late = await raceAbort(
        pending.catch((): DeployOutcome | null => null),
        signal
      );
      if (late?.ok) {
        this.options.logger.warn(
          { timeoutMs: this.deployTimeoutMs },
          "Deployment committed after its timeout"
        );
        return undefined;
      }
      return new DeploymentError(sanitizeErrorText(err.message), "timeout");
    } finally {
      signal?.removeEventListener("abort", onRunAbort);
    }
  }

  private toFailure(outcome: DeployOutcome): DeploymentError | undefined {
    if (outcome.ok) return undefined;
    const rawError = sanitizeErrorText(outcome.error);
    return new DeploymentError(rawError, this.classifier.classify(rawError));
  }

  private async searchOnce(
    rawError: string,
    object: MigrationObject,
    signal?: AbortSignal
  ): Promise<SearchHit[]> {
    const search = this.options.search;
    if (!search) return [];
    try {
      const hits = await withTimeout(
        () => raceAbort(search.search(normalizeErrorText(rawError), object.kind, signal), signal),
        this.searchTimeoutMs,
        "web search"
      );
      this.options.logger.debug({ hits: hits.length }, "Web search finished");
      return hits;
    } catch (err) {
      if (err instanceof MigrationCancelledError) throw err;
      this.options.logger.warn({ error: errorMessage(err) }, "Web search failed, repairing without it");
      return [];
    }
  }

  private recordSuccess(
    object: MigrationObject,
    index: number,
    kindsSeen: readonly ErrorKind[],
    lastFix: AppliedFix | null,
    note?: string
  ): void {
    const timestamp = this.now().toISOString();
    const base =
      index === 1
        ? "deployed on first attempt"
        : `fixed [${kindsSeen.join(" -> ")}] in ${index} attempts: ${firstLine(lastFix?.fix ?? "")}`;

    this.options.memory.appendPattern({
      kind: object.kind,
      objectName: object.identity.name,
      outcome: "success",
      fixSummary: truncate(note ? `${base} (${note})` : base, 300),
      timestamp,
    });

    if (lastFix && !lastFix.hadMemoryHit) {
      this.options.memory.appendSolution({
        signature: lastFix.signature,
        solution: truncate(lastFix.fix, SOLUTION_TEXT_LIMIT),
        provenance: lastFix.usedSearch ? "web-search" : "translator",
        recordedAt: timestamp,
      });
    }
  }

  private attempt(
    index: number,
    error: string | null,
    errorKind: ErrorKind | null,
    fixText: string | null,
    outcome: DeploymentAttempt["outcome"]
  ): DeploymentAttempt {
    return Object.freeze({
      index,
      error,
      errorKind,
      fixText,
      outcome,
      timestamp: this.now().toISOString(),
    });
  }
}
