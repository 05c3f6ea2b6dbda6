import { randomBytes } from "node:crypto";

/**
 * Generate a compact, time-sortable run ID.
 * Format: base36(timestamp) + "-" + 8 hex chars of randomness.
 */
export function generateRunId(): string {
  const timePart = Date.now().toString(36);
  const randomPart = randomBytes(4).toString("hex");
  return `${timePart}-${randomPart}`;
}

/** `yyyyMMdd_HHmmss` in UTC, used in report file names. */
export function formatReportStamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}
