/**
 * Deterministic rule-based converter from Oracle-flavoured PL/SQL to
 * PostgreSQL. Rewrites what maps one-to-one and reports the rest in the same
 * `ERROR:` / `WARNING:` log format the external converter uses, so both go
 * through parseDiagnostics.
 */
import type { PrimaryConversion, PrimaryConverter } from "../collaborators.js";
import type { ObjectKind } from "../types.js";
import { parseDiagnostics } from "./diagnostics.js";

interface RewriteRule {
  pattern: RegExp;
  replacement: string;
}

interface ConstructRule {
  pattern: RegExp;
  message: string;
  /** Restrict the rule to some object kinds. */
  kinds?: readonly ObjectKind[];
}

const REWRITE_RULES: readonly RewriteRule[] = [
  // SQL*Plus block terminators
  { pattern: /^\s*\/\s*$/gm, replacement: "" },

  // Types
  { pattern: /\bN?VARCHAR2\s*\(\s*(\d+)\s*(?:BYTE|CHAR)?\s*\)/gi, replacement: "VARCHAR($1)" },
  { pattern: /\bN?VARCHAR2\b/gi, replacement: "VARCHAR" },
  { pattern: /\bNUMBER\s*\(\s*(\d+)\s*,\s*(\d+)\s*\)/gi, replacement: "NUMERIC($1,$2)" },
  { pattern: /\bNUMBER\s*\(\s*(\d+)\s*\)/gi, replacement: "NUMERIC($1)" },
  { pattern: /\bNUMBER\b/gi, replacement: "NUMERIC" },
  { pattern: /\b(?:PLS_INTEGER|BINARY_INTEGER)\b/gi, replacement: "INTEGER" },
  { pattern: /\bN?CLOB\b/gi, replacement: "TEXT" },
  { pattern: /\bLONG\s+RAW\b/gi, replacement: "BYTEA" },
  { pattern: /\bRAW\s*\(\s*\d+\s*\)/gi, replacement: "BYTEA" },
  { pattern: /\bBLOB\b/gi, replacement: "BYTEA" },
  { pattern: /\bDATE\b(?!\s*')/gi, replacement: "TIMESTAMP(0)" },
  { pattern: /\bGENERATED\s+BY\s+DEFAULT\s+ON\s+NULL\s+AS\s+IDENTITY\b/gi, replacement: "GENERATED BY DEFAULT AS IDENTITY" },

  // Built-in functions
  { pattern: /\bSYSTIMESTAMP\b/gi, replacement: "CURRENT_TIMESTAMP" },
  { pattern: /\bSYSDATE\b/gi, replacement: "CURRENT_TIMESTAMP" },
  { pattern: /\bNVL\s*\(/gi, replacement: "COALESCE(" },
  { pattern: /\s+FROM\s+DUAL\b/gi, replacement: "" },
  { pattern: /\b(\w+)\.NEXTVAL\b/gi, replacement: "nextval('$1')" },
  { pattern: /\b(\w+)\.CURRVAL\b/gi, replacement: "currval('$1')" },
  {
    pattern: /\bRAISE_APPLICATION_ERROR\s*\(\s*-?\d+\s*,\s*('(?:[^']|'')*')\s*\)/gi,
    replacement: "RAISE EXCEPTION $1",
  },
  { pattern: /\bDBMS_OUTPUT\.PUT_LINE\s*\(([^;]*)\)\s*;/gi, replacement: "RAISE NOTICE '%', $1;" },

  // CREATE normalization
  { pattern: /\bCREATE\s+(?!OR\s+REPLACE\b)(PROCEDURE|FUNCTION|TRIGGER|VIEW)\b/gi, replacement: "CREATE OR REPLACE $1" },
  { pattern: /\bCREATE\s+OR\s+REPLACE\s+(?:EDITIONABLE|NONEDITIONABLE)\s+/gi, replacement: "CREATE OR REPLACE " },
  { pattern: /\bCREATE\s+TABLE\s+(?!IF\s+NOT\s+EXISTS\b)/gi, replacement: "CREATE TABLE IF NOT EXISTS " },
];

const UNSUPPORTED_CONSTRUCTS: readonly ConstructRule[] = [
  { pattern: /%ROWTYPE\b/gi, message: "%ROWTYPE attribute needs manual mapping" },
  { pattern: /%TYPE\b/gi, message: "%TYPE attribute needs manual mapping" },
  { pattern: /\bCONNECT\s+BY\b/gi, message: "hierarchical query (CONNECT BY) needs a recursive CTE" },
  { pattern: /\bDECODE\s*\(/gi, message: "DECODE needs a CASE expression" },
  { pattern: /\(\+\)/g, message: "outer join operator (+) needs an ANSI join" },
  { pattern: /\bROWNUM\b/gi, message: "ROWNUM needs LIMIT or row_number()" },
  { pattern: /\bPRAGMA\s+AUTONOMOUS_TRANSACTION\b/gi, message: "autonomous transactions are not supported" },
  { pattern: /\bEXECUTE\s+IMMEDIATE\b/gi, message: "EXECUTE IMMEDIATE needs EXECUTE with format()" },
  { pattern: /\b(?:DBMS|UTL)_(?!OUTPUT\.PUT_LINE\b)\w+\.\w+/gi, message: "reference to a built-in package" },
];

const INEXPRESSIBLE_CONSTRUCTS: readonly ConstructRule[] = [
  {
    pattern: /\bPRAGMA\s+EXCEPTION_INIT\b/gi,
    message: "PRAGMA EXCEPTION_INIT cannot be expressed in a trigger",
    kinds: ["Trigger"],
  },
  { pattern: /\bCREATE\s+(?:OR\s+REPLACE\s+)?TYPE\b[\s\S]*?\bAS\s+OBJECT\b/gi, message: "object types cannot be converted" },
  { pattern: /\bCREATE\s+(?:OR\s+REPLACE\s+)?TYPE\s+BODY\b/gi, message: "object type bodies cannot be converted" },
];

function lineOf(text: string, index: number): number {
  let line = 1;
  for (let i = 0; i < index && i < text.length; i++) {
    if (text.charCodeAt(i) === 10) line++;
  }
  return line;
}

function scan(
  sourceText: string,
  kind: ObjectKind,
  rules: readonly ConstructRule[],
  level: "ERROR" | "WARNING"
): string[] {
  const lines: string[] = [];
  for (const rule of rules) {
    if (rule.kinds && !rule.kinds.includes(kind)) continue;
    for (const match of sourceText.matchAll(rule.pattern)) {
      lines.push(`${level}: line ${lineOf(sourceText, match.index ?? 0)}: ${rule.message}`);
    }
  }
  return lines;
}

export function applyRewriteRules(text: string, rules: readonly RewriteRule[] = REWRITE_RULES): string {
  let out = text;
  for (const rule of rules) {
    out = out.replace(rule.pattern, rule.replacement);
  }
  return out.replace(/\n{3,}/g, "\n\n").trim();
}

export class RuleBasedConverter implements PrimaryConverter {
  readonly name = "rules";

  async convert(sourceText: string, kind: ObjectKind): Promise<PrimaryConversion> {
    const log = [
      ...scan(sourceText, kind, INEXPRESSIBLE_CONSTRUCTS, "ERROR"),
      ...scan(sourceText, kind, UNSUPPORTED_CONSTRUCTS, "WARNING"),
    ].join("\n");

    const { errorCount, warningCount, diagnostics } = parseDiagnostics(log);
    return {
      text: applyRewriteRules(sourceText),
      errorCount,
      warningCount,
      diagnostics,
    };
  }
}
