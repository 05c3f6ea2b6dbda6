/**
 * Row-level data must never reach the fallback translator. Table payloads
 * are checked before every translator call; a hit is a programming error.
 */
import { RowDataBoundaryError } from "../errors.js";
import type { TranslationRequest } from "../collaborators.js";

const ROW_DATA_PATTERNS: ReadonlyArray<{ label: string; pattern: RegExp }> = [
  { label: "INSERT ... VALUES", pattern: /\binsert\s+into\b[^;]*?\bvalues\s*\(/i },
  { label: "INSERT ALL", pattern: /\binsert\s+all\b/i },
  { label: "COPY ... FROM stdin", pattern: /\bcopy\s+[\w."]+(?:\s*\([^)]*\))?\s+from\s+stdin\b/i },
];

export function findRowData(text: string): string | null {
  for (const { label, pattern } of ROW_DATA_PATTERNS) {
    if (pattern.test(text)) return label;
  }
  return null;
}

// Server error details echo the offending values: `Key (email)=(...)`, `Failing row contains (...)`.
const VALUE_TUPLE = String.raw`\((?:[^()]|\([^()]*\))*\)`;
const KEY_VALUES = new RegExp(String.raw`(\bKey \([^)]*\)=)${VALUE_TUPLE}`, "g");
const FAILING_ROW = new RegExp(String.raw`(\bFailing row contains )${VALUE_TUPLE}`, "gi");
const REDACTED_ROW = "(<row>)";

const ROW_VALUE_PATTERNS: ReadonlyArray<{ label: string; pattern: RegExp }> = [
  { label: "key values", pattern: /\bKey \([^)]*\)=\((?!<row>\))/ },
  { label: "failing row", pattern: /\bFailing row contains \((?!<row>\))/i },
];

/** Replace the value tuples a server echoes in error details with `(<row>)`. */
export function redactRowValues(text: string): string {
  return text.replace(KEY_VALUES, `$1${REDACTED_ROW}`).replace(FAILING_ROW, `$1${REDACTED_ROW}`);
}

export function findRowValues(text: string): string | null {
  for (const { label, pattern } of ROW_VALUE_PATTERNS) {
    if (pattern.test(text)) return label;
  }
  return null;
}

export function assertNoRowData(request: TranslationRequest): void {
  if (request.kind !== "Table") return;

  const payloads: Array<[string, string]> = [["source text", request.sourceText]];
  for (const p of request.patterns) payloads.push(["pattern", p.fixSummary]);
  if (request.repair) {
    payloads.push(["converted text", request.repair.currentText]);
    payloads.push(["error text", request.repair.rawError]);
    for (const error of request.repair.previousErrors) payloads.push(["earlier error", error]);
    for (const hit of request.repair.memoryHits) payloads.push(["known solution", hit.solution]);
  }

  for (const [field, text] of payloads) {
    const label = findRowData(text) ?? findRowValues(text);
    if (label) {
      throw new RowDataBoundaryError(request.objectName, `${label} in ${field}`);
    }
  }
}

/**
 * Drop data statements from an exported table definition, keeping DDL.
 * Statements are split on `;` at line ends, which is how export tools emit them.
 */
export function stripRowData(text: string): string {
  const kept: string[] = [];
  let insideCopy = false;
  const statements: string[] = [];
  let current: string[] = [];

  for (const line of text.split(/\r?\n/)) {
    if (insideCopy) {
      if (line.trim() === "\\.") insideCopy = false;
      continue;
    }
    if (/^\s*copy\s.+\sfrom\s+stdin\b/i.test(line)) {
      insideCopy = true;
      continue;
    }
    current.push(line);
    if (/;\s*$/.test(line) || /^\s*\/\s*$/.test(line)) {
      statements.push(current.join("\n"));
      current = [];
    }
  }
  if (current.length > 0) statements.push(current.join("\n"));

  for (const statement of statements) {
    if (findRowData(statement)) continue;
    kept.push(statement);
  }
  return kept.join("\n").replace(/\n{3,}/g, "\n\n").trim();
}
