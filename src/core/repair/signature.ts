/**
 * Error signatures group equivalent failures across objects so that a fix
 * learned once can be looked up again.
 */
import { redactRowValues } from "../conversion/row-data-guard.js";
import type { ErrorKind, ObjectKind } from "../types.js";

export const SIGNATURE_TEXT_LIMIT = 120;

/** Strip row values, credentials, addresses and secrets from error text. */
export function sanitizeErrorText(message: string): string {
  return (
    redactRowValues(message)
      // URLs with credentials (user:pass@host)
      .replace(/[a-z][a-z0-9+.-]*:\/\/[^\s:/@]+:[^\s@]+@[^\s]+/gi, "<REDACTED_CREDENTIAL>")
      // Standalone user:password@host
      .replace(/\b[a-zA-Z0-9_.-]+:[^\s@'"]+@(?=[a-zA-Z0-9.-]+)/g, "<REDACTED_CREDENTIAL>@")
      // key=value secrets
      .replace(/\b(password|pwd|passwd|secret)\s*[=:]\s*[^\s;,'"]+/gi, "$1=<REDACTED>")
      .replace(/api[_-]?key['":\s=]+[a-zA-Z0-9_-]+/gi, "api_key=<REDACTED>")
      // IP addresses
      .replace(/\b(?:\d{1,3}\.){3}\d{1,3}\b/g, "<IP>")
      // Long tokens mixing letters and digits
      .replace(
        /\b(?=[A-Za-z0-9_-]*\d)(?=[A-Za-z0-9_-]*[A-Za-z])[A-Za-z0-9_-]{24,}\b/g,
        "<REDACTED_TOKEN>"
      )
  );
}

/**
 * Lowercase, replace quoted identifiers, hex ids, numbers and line/position
 * markers with placeholders, collapse whitespace, truncate.
 */
export function normalizeErrorText(raw: string): string {
  return raw
    .toLowerCase()
    .replace(/"[^"]*"|'[^']*'|\[[^\]]*\]|`[^`]*`/g, "<id>")
    .replace(/\b0x[0-9a-f]+\b/g, "<hex>")
    .replace(/\b(?=[0-9a-f]*[a-f])(?=[0-9a-f]*\d)[0-9a-f]{8,}\b/g, "<hex>")
    .replace(/\b(line|position|column|col)\s*:?\s*\d+/g, "$1 <n>")
    .replace(/\d+/g, "<n>")
    .replace(/\s+/g, " ")
    .trim()
    .slice(0, SIGNATURE_TEXT_LIMIT);
}

/** `<ObjectKind>:<error-kind>:<normalized text>` */
export function buildSignature(
  objectKind: ObjectKind,
  errorKind: ErrorKind,
  rawText: string
): string {
  return `${objectKind}:${errorKind}:${normalizeErrorText(sanitizeErrorText(rawText))}`;
}
