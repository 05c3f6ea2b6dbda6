/**
 * Two-tier repair for malformed model output.
 * Tier 1: Quick fixes (no LLM call)
 * Tier 2: LLM re-prompt (if quick fix fails and a provider is configured)
 */
import type { LLMProvider } from "../llm/provider.js";
import type { UsageTracker } from "../llm/usage.js";
import type { Logger } from "../../utils/logger.js";
import { isRecord } from "../../utils/guards.js";

export interface OutputRepairOptions {
  llm?: { provider: LLMProvider; model: string };
  usage?: UsageTracker;
  maxAttempts?: number;
}

/** Strip a surrounding markdown fence from model output. */
export function stripCodeFences(raw: string): string {
  const trimmed = raw.trim();
  const fenced = /^```[\w-]*\s*\n([\s\S]*?)\n?```\s*$/.exec(trimmed);
  if (fenced?.[1] !== undefined) return fenced[1].trim();
  const inner = /```[\w-]*\s*\n([\s\S]*?)\n?```/.exec(trimmed);
  return (inner?.[1] ?? trimmed).trim();
}

function parseObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export class OutputRepair {
  private readonly maxAttempts: number;

  constructor(
    private logger: Logger,
    private options: OutputRepairOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? 1;
  }

  /**
   * Parse a JSON object, applying repairs if needed.
   * Returns null if all repairs fail.
   */
  async tryParseJson(raw: string, signal?: AbortSignal): Promise<Record<string, unknown> | null> {
    const direct = parseObject(raw);
    if (direct) return direct;

    const quickFixed = parseObject(this.quickFix(raw));
    if (quickFixed) {
      this.logger.debug("Output repaired via quick fix");
      return quickFixed;
    }

    if (this.options.llm) {
      return this.llmRepair(raw, this.options.llm, signal);
    }

    return null;
  }

  /**
   * Quick-fix a raw string that should be JSON.
   * Applies common fixes without an LLM call.
   */
  quickFix(raw: string): string {
    let fixed = stripCodeFences(raw);

    // Drop prose around the outermost object
    const start = fixed.indexOf("{");
    const end = fixed.lastIndexOf("}");
    if (start > 0 && end > start) fixed = fixed.slice(start, end + 1);

    // Remove trailing commas before } or ]
    fixed = fixed.replace(/,\s*([}\]])/g, "$1");

    // Single quotes to double quotes, only when there are no double quotes
    if (!fixed.includes('"') && fixed.includes("'")) {
      fixed = fixed.replace(/'/g, '"');
    }

    // Close simple truncation
    const openBrackets = (fixed.match(/\[/g) ?? []).length;
    const closeBrackets = (fixed.match(/]/g) ?? []).length;
    if (openBrackets > closeBrackets) {
      fixed += "]".repeat(openBrackets - closeBrackets);
    }

    const opens = (fixed.match(/{/g) ?? []).length;
    const closes = (fixed.match(/}/g) ?? []).length;
    if (opens > closes) {
      fixed += "}".repeat(opens - closes);
    }

    return fixed;
  }

  private async llmRepair(
    raw: string,
    llm: { provider: LLMProvider; model: string },
    signal?: AbortSignal
  ): Promise<Record<string, unknown> | null> {
    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      try {
        const response = await llm.provider.chat({
          model: llm.model,
          system: "You fix malformed JSON. Return ONLY the corrected JSON with no explanation or markdown.",
          messages: [
            {
              role: "user",
              content: `The following was supposed to be valid JSON but has errors. Return only the corrected JSON:\n\n${raw.substring(0, 2000)}`,
            },
          ],
          maxTokens: 1024,
          signal,
        });
        this.options.usage?.track(response.provider, response.model, response.usage, "json-repair");

        if (response.text) {
          const parsed = parseObject(this.quickFix(response.text));
          if (parsed) {
            this.logger.debug({ attempt: attempt + 1 }, "Output repaired via LLM re-prompt");
            return parsed;
          }
        }
      } catch (err) {
        this.logger.debug(
          { attempt: attempt + 1, error: err instanceof Error ? err.message : String(err) },
          "LLM repair attempt failed"
        );
      }
    }

    return null;
  }
}
