/**
 * Prompt text for the fallback translator and the reviewer.
 */
import type { TranslationRequest } from "../collaborators.js";
import { ContentSanitizer } from "../sanitizer.js";
import { truncate } from "../../utils/text.js";

export const CONVERT_SYSTEM_PROMPT = `You convert Oracle PL/SQL schema objects to PostgreSQL.

Rules:
- Return ONLY the converted PostgreSQL code, no explanation and no markdown.
- Preserve object names, parameter names and behaviour.
- Use CREATE OR REPLACE for procedures, functions and triggers; CREATE TABLE IF NOT EXISTS for tables.
- Triggers need a trigger function plus a CREATE TRIGGER statement.
- Never emit INSERT statements with literal row values.`;

export const REPAIR_SYSTEM_PROMPT = `You fix PostgreSQL code that failed to deploy.

You receive the original Oracle source, the current PostgreSQL code, the database error and any known fixes.
Return ONLY the complete corrected PostgreSQL code, no explanation and no markdown.
Change only what the error requires. Never emit INSERT statements with literal row values.`;

export const REVIEW_SYSTEM_PROMPT = `You review Oracle-to-PostgreSQL conversions.

Return ONLY a JSON object, no markdown:
{
  "grade": "A" | "B" | "C" | "D" | "F",
  "issues": ["short description of each problem"],
  "summary": "one sentence"
}`;

const SOURCE_LIMIT = 40_000;

function section(title: string, body: string): string {
  return `## ${title}\n${body}`;
}

export function buildTranslationPrompt(request: TranslationRequest): string {
  const parts: string[] = [
    `Object: ${request.objectName} (${request.kind})`,
    section("Oracle source", truncate(request.sourceText, SOURCE_LIMIT)),
  ];

  if (request.patterns.length > 0) {
    const lines = request.patterns.map((p) => `- ${p.objectName}: ${p.fixSummary}`);
    parts.push(section(`Earlier successful ${request.kind} conversions`, lines.join("\n")));
  }

  const repair = request.repair;
  if (repair) {
    parts.push(section("Current PostgreSQL code", truncate(repair.currentText, SOURCE_LIMIT)));
    parts.push(section(`Deployment error (${repair.errorKind})`, repair.rawError));

    if (repair.identityColumns.length > 0) {
      parts.push(section("Identity columns", repair.identityColumns.join(", ")));
    }
    if (repair.memoryHits.length > 0) {
      const lines = repair.memoryHits.map((s) => `- (${s.provenance}) ${truncate(s.solution, 1_000)}`);
      parts.push(section("Fixes that worked before for this error", lines.join("\n")));
    }
    if (repair.searchHits.length > 0) {
      parts.push(section("Web search results", ContentSanitizer.sanitizeSearchHits(repair.searchHits)));
    }
    if (repair.previousErrors.length > 0) {
      const lines = repair.previousErrors.map((e, i) => `${i + 1}. ${truncate(e, 300)}`);
      parts.push(section("Errors from earlier attempts", lines.join("\n")));
    }
  }

  return parts.join("\n\n");
}

export function buildReviewPrompt(input: {
  objectName: string;
  kind: string;
  sourceText: string;
  targetText: string;
}): string {
  return [
    `Object: ${input.objectName} (${input.kind})`,
    section("Oracle source", truncate(input.sourceText, SOURCE_LIMIT)),
    section("PostgreSQL conversion", truncate(input.targetText, SOURCE_LIMIT)),
  ].join("\n\n");
}
