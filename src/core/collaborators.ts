/**
 * Narrow interfaces for everything the engine talks to. The engine only
 * depends on these; concrete adapters live under src/integrations and
 * src/core/conversion.
 */
import type {
  ErrorKind,
  ErrorSolution,
  ObjectDescription,
  ObjectIdentity,
  ObjectKind,
  Pattern,
} from "./types.js";

export interface SourceObjectRef {
  identity: ObjectIdentity;
  kind: ObjectKind;
  packageName?: string;
}

export interface SourceCatalog {
  fetchDefinition(ref: SourceObjectRef, signal?: AbortSignal): Promise<string>;
  /** Throws when the source cannot be reached. */
  ping(): Promise<void>;
}

export interface PrimaryConversion {
  text: string;
  errorCount: number;
  warningCount: number;
  diagnostics: string[];
}

export interface PrimaryConverter {
  readonly name: string;
  convert(sourceText: string, kind: ObjectKind, signal?: AbortSignal): Promise<PrimaryConversion>;
}

export interface SearchHit {
  title: string;
  url: string;
  snippet: string;
}

export interface RepairContext {
  currentText: string;
  rawError: string;
  errorKind: ErrorKind;
  memoryHits: ErrorSolution[];
  searchHits: SearchHit[];
  previousErrors: string[];
  identityColumns: string[];
}

/** Everything handed to the fallback translator. Never carries row data. */
export interface TranslationRequest {
  objectName: string;
  kind: ObjectKind;
  sourceText: string;
  patterns: Pattern[];
  repair?: RepairContext;
}

export interface FallbackTranslator {
  translate(request: TranslationRequest, signal?: AbortSignal): Promise<string>;
}

export type ReviewGrade = "A" | "B" | "C" | "D" | "F";

export interface ReviewResult {
  grade: ReviewGrade;
  issues: string[];
  summary: string;
}

export interface ReviewInput {
  objectName: string;
  kind: ObjectKind;
  sourceText: string;
  targetText: string;
}

export interface CodeReviewer {
  review(input: ReviewInput, signal?: AbortSignal): Promise<ReviewResult>;
}

export type DeployOutcome = { ok: true } | { ok: false; error: string };

export interface DeploymentExecutor {
  deploy(text: string, signal?: AbortSignal): Promise<DeployOutcome>;
  /** Throws when the target cannot be reached. */
  ping(): Promise<void>;
}

export interface MetadataRefresher {
  describe(identity: ObjectIdentity, kind: ObjectKind): Promise<ObjectDescription | null>;
}

export interface WebSearch {
  search(query: string, kind: ObjectKind, signal?: AbortSignal): Promise<SearchHit[]>;
}
