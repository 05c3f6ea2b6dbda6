/**
 * Persistent cross-object learning: known schemas, identity columns, table
 * mappings, error solutions and the pattern log.
 *
 * The whole document lives in memory and is flushed wholesale. Writes go to
 * a temp file in the same directory and are renamed into place, so a reader
 * never sees a half-written document.
 */
import { mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { PersistenceError, errorMessage, isMissingFile } from "../errors.js";
import type {
  ErrorSolution,
  ObjectKind,
  Pattern,
  PatternOutcome,
} from "../types.js";
import type { Logger } from "../../utils/logger.js";
import {
  MemoryDocumentSchema,
  emptyMemoryDocument,
  type MemoryDocument,
  type SchemaEntry,
} from "./schema.js";

export interface SharedMemoryStoreOptions {
  path: string;
  logger: Logger;
  now?: () => Date;
}

export interface MemoryStats {
  schemas: number;
  tablesWithIdentity: number;
  errorSignatures: number;
  errorSolutions: number;
  successfulPatterns: number;
  failedPatterns: number;
  tableMappings: number;
}

export interface TableMapping {
  targetSchema: string;
  targetName: string;
}

/** Section keys are case-insensitive object names. */
function keyOf(name: string): string {
  return name.toUpperCase();
}

export class SharedMemoryStore {
  private doc: MemoryDocument = emptyMemoryDocument();
  private inMemoryOnly = false;
  private readonly path: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: SharedMemoryStoreOptions) {
    this.path = options.path;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /** Missing file → empty. Unreadable, unparsable or invalid → empty plus a warning. */
  async load(): Promise<MemoryDocument> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf-8");
    } catch (err) {
      if (!isMissingFile(err)) {
        this.logger.warn(
          { error: new PersistenceError(`Cannot read memory store: ${errorMessage(err)}`, { cause: err }), path: this.path },
          "Memory store unreadable, starting empty"
        );
      }
      this.doc = emptyMemoryDocument();
      return this.snapshot();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.logger.warn({ path: this.path, error: errorMessage(err) }, "Memory store is not valid JSON, starting empty");
      this.doc = emptyMemoryDocument();
      return this.snapshot();
    }

    const result = MemoryDocumentSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn(
        { path: this.path, issues: result.error.issues.slice(0, 5).map((i) => i.message) },
        "Memory store failed validation, starting empty"
      );
      this.doc = emptyMemoryDocument();
      return this.snapshot();
    }

    this.doc = result.data;
    this.logger.info({ path: this.path, ...this.stats() }, "Memory store loaded");
    return this.snapshot();
  }

  /**
   * Flush the document. A failure is logged once and the store stays
   * in-memory for the rest of the session. Returns whether the write landed.
   */
  async persist(): Promise<boolean> {
    if (this.inMemoryOnly) return false;

    const dir = dirname(this.path);
    const tmp = join(dir, `.${basename(this.path)}.${process.pid}.${Date.now()}.tmp`);
    try {
      await mkdir(dir, { recursive: true });
      await writeFile(tmp, JSON.stringify(this.doc, null, 2), "utf-8");
      await rename(tmp, this.path);
      return true;
    } catch (err) {
      this.inMemoryOnly = true;
      this.logger.error(
        { error: new PersistenceError(`Cannot write memory store: ${errorMessage(err)}`, { cause: err }), path: this.path },
        "Memory store persistence failed, continuing in memory only"
      );
      await unlink(tmp).catch((cleanupErr: unknown) => {
        this.logger.debug({ error: errorMessage(cleanupErr) }, "No temp file to clean up");
      });
      return false;
    }
  }

  isInMemoryOnly(): boolean {
    return this.inMemoryOnly;
  }

  // ---- Error solutions ----

  /** Most recent first. */
  getSolutions(signature: string, limit = 5): ErrorSolution[] {
    const entries = this.doc.error_solutions[signature] ?? [];
    return [...entries]
      .reverse()
      .slice(0, limit)
      .map((e) => ({ signature, ...e }));
  }

  countSolutions(signature: string): number {
    return this.doc.error_solutions[signature]?.length ?? 0;
  }

  appendSolution(solution: ErrorSolution): void {
    const list = this.doc.error_solutions[solution.signature] ?? [];
    list.push({
      solution: solution.solution,
      provenance: solution.provenance,
      recordedAt: solution.recordedAt,
    });
    this.doc.error_solutions[solution.signature] = list;
    this.touch();
  }

  // ---- Patterns ----

  appendPattern(pattern: Pattern): void {
    this.doc.patterns.push({ ...pattern });
    this.touch();
  }

  /** Most recent first. */
  getPatterns(kind: ObjectKind, outcome: PatternOutcome, limit = 5): Pattern[] {
    const matches: Pattern[] = [];
    for (let i = this.doc.patterns.length - 1; i >= 0 && matches.length < limit; i--) {
      const p = this.doc.patterns[i];
      if (p && p.kind === kind && p.outcome === outcome) matches.push({ ...p });
    }
    return matches;
  }

  // ---- Schemas ----

  upsertSchema(database: string, schema: string, exists = true): void {
    this.doc.schemas[`${database}.${schema}`] = {
      exists,
      updatedAt: this.now().toISOString(),
    };
    this.touch();
  }

  getSchema(database: string, schema: string): SchemaEntry | undefined {
    const entry = this.doc.schemas[`${database}.${schema}`];
    return entry ? { ...entry } : undefined;
  }

  // ---- Identity columns ----

  upsertIdentityColumns(tableName: string, columns: readonly string[]): void {
    this.doc.identity_columns[keyOf(tableName)] = [...new Set(columns)];
    this.touch();
  }

  getIdentityColumns(tableName: string): string[] {
    return [...(this.doc.identity_columns[keyOf(tableName)] ?? [])];
  }

  // ---- Table mappings ----

  upsertTableMapping(sourceName: string, mapping: TableMapping): void {
    this.doc.table_mappings[keyOf(sourceName)] = {
      targetSchema: mapping.targetSchema,
      targetName: mapping.targetName,
      updatedAt: this.now().toISOString(),
    };
    this.touch();
  }

  getTableMapping(sourceName: string): TableMapping | undefined {
    const entry = this.doc.table_mappings[keyOf(sourceName)];
    return entry ? { targetSchema: entry.targetSchema, targetName: entry.targetName } : undefined;
  }

  // ---- Introspection ----

  snapshot(): MemoryDocument {
    return structuredClone(this.doc);
  }

  stats(): MemoryStats {
    const solutionLists = Object.values(this.doc.error_solutions);
    return {
      schemas: Object.keys(this.doc.schemas).length,
      tablesWithIdentity: Object.values(this.doc.identity_columns).filter((c) => c.length > 0).length,
      errorSignatures: solutionLists.length,
      errorSolutions: solutionLists.reduce((sum, list) => sum + list.length, 0),
      successfulPatterns: this.doc.patterns.filter((p) => p.outcome === "success").length,
      failedPatterns: this.doc.patterns.filter((p) => p.outcome === "failure").length,
      tableMappings: Object.keys(this.doc.table_mappings).length,
    };
  }

  private touch(): void {
    this.doc.last_updated = this.now().toISOString();
  }
}
