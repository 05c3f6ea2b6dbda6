/** Parses converter logs in the `ERROR:` / `WARNING:` line format. */

export interface DiagnosticsSummary {
  errorCount: number;
  warningCount: number;
  diagnostics: string[];
}

const ERROR_MARKER = /\b(?:ERROR|Error):/;
const WARNING_MARKER = /\b(?:WARNING|Warning):/;

export function parseDiagnostics(log: string): DiagnosticsSummary {
  let errorCount = 0;
  let warningCount = 0;
  const diagnostics: string[] = [];

  for (const line of log.split(/\r?\n/)) {
    if (ERROR_MARKER.test(line)) {
      errorCount++;
      diagnostics.push(line.trim());
    } else if (WARNING_MARKER.test(line)) {
      warningCount++;
      diagnostics.push(line.trim());
    }
  }

  return { errorCount, warningCount, diagnostics };
}
