/**
 * Chooses between the primary converter and the fallback translator.
 *
 * The primary result is accepted when it reports no errors and at most
 * `warningThreshold` warnings. A primary converter that throws or times out
 * is a ConversionError; it sends the object to the fallback and is not
 * counted against the repair budget.
 */
import type {
  FallbackTranslator,
  PrimaryConverter,
  TranslationRequest,
} from "../collaborators.js";
import { ConversionError, errorMessage } from "../errors.js";
import type { SharedMemoryStore } from "../memory/shared-memory-store.js";
import { withTimeout } from "../resilient-executor.js";
import { qualifiedName, type ConversionResult, type MigrationObject } from "../types.js";
import type { Logger } from "../../utils/logger.js";
import { assertNoRowData } from "./row-data-guard.js";

export interface ConversionRouterOptions {
  primary: PrimaryConverter;
  fallback: FallbackTranslator;
  memory: SharedMemoryStore;
  logger: Logger;
  warningThreshold?: number;
  patternLimit?: number;
  primaryTimeoutMs?: number;
  fallbackTimeoutMs?: number;
}

export class ConversionRouter {
  private readonly primary: PrimaryConverter;
  private readonly fallback: FallbackTranslator;
  private readonly memory: SharedMemoryStore;
  private readonly logger: Logger;
  private readonly warningThreshold: number;
  private readonly patternLimit: number;
  private readonly primaryTimeoutMs: number;
  private readonly fallbackTimeoutMs: number;

  constructor(options: ConversionRouterOptions) {
    this.primary = options.primary;
    this.fallback = options.fallback;
    this.memory = options.memory;
    this.logger = options.logger;
    this.warningThreshold = options.warningThreshold ?? 5;
    this.patternLimit = options.patternLimit ?? 5;
    this.primaryTimeoutMs = options.primaryTimeoutMs ?? 120_000;
    this.fallbackTimeoutMs = options.fallbackTimeoutMs ?? 180_000;
  }

  /** Throws ConversionError when both paths fail; RowDataBoundaryError propagates as-is. */
  async convert(object: MigrationObject, signal?: AbortSignal): Promise<ConversionResult> {
    const sourceText = object.sourceText;
    if (sourceText === null) {
      throw new ConversionError(`No source text for ${qualifiedName(object.identity)}`);
    }

    let primaryDiagnostics: string[] = [];
    try {
      const primary = await withTimeout(
        () => this.primary.convert(sourceText, object.kind, signal),
        this.primaryTimeoutMs,
        `${this.primary.name} conversion`
      );
      if (primary.errorCount === 0 && primary.warningCount <= this.warningThreshold) {
        this.logger.info(
          { tool: this.primary.name, warnings: primary.warningCount },
          "Primary conversion accepted"
        );
        const accepted: ConversionResult = {
          tool: "primary",
          text: primary.text,
          errorCount: primary.errorCount,
          warningCount: primary.warningCount,
          diagnostics: Object.freeze([...primary.diagnostics]),
        };
        return Object.freeze(accepted);
      }
      primaryDiagnostics = primary.diagnostics;
      this.logger.info(
        {
          tool: this.primary.name,
          errors: primary.errorCount,
          warnings: primary.warningCount,
          threshold: this.warningThreshold,
        },
        "Primary conversion rejected, using fallback translator"
      );
    } catch (err) {
      const failure =
        err instanceof ConversionError
          ? err
          : new ConversionError(`${this.primary.name} failed: ${errorMessage(err)}`, { cause: err });
      this.logger.warn({ error: failure }, "Primary converter failed, using fallback translator");
    }

    const request: TranslationRequest = {
      objectName: object.identity.name,
      kind: object.kind,
      sourceText,
      patterns: this.memory.getPatterns(object.kind, "success", this.patternLimit),
    };
    assertNoRowData(request);

    let text: string;
    try {
      text = await withTimeout(
        () => this.fallback.translate(request, signal),
        this.fallbackTimeoutMs,
        "fallback translation"
      );
    } catch (err) {
      throw new ConversionError(`Fallback translation failed: ${errorMessage(err)}`, { cause: err });
    }

    const translated: ConversionResult = {
      tool: "fallback",
      text,
      errorCount: 0,
      warningCount: 0,
      diagnostics: Object.freeze([...primaryDiagnostics]),
    };
    return Object.freeze(translated);
  }
}
