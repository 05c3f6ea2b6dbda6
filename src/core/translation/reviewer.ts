/**
 * Advisory LLM review of a converted object. The result never blocks
 * deployment; it is logged and folded into the success pattern.
 */
import { z } from "zod";
import type { CodeReviewer, ReviewInput, ReviewResult } from "../collaborators.js";
import type { LLMProvider } from "../llm/provider.js";
import type { UsageTracker } from "../llm/usage.js";
import { OutputRepair } from "./output-repair.js";
import { REVIEW_SYSTEM_PROMPT, buildReviewPrompt } from "./prompts.js";
import type { Logger } from "../../utils/logger.js";

const ReviewSchema = z.object({
  grade: z
    .string()
    .transform((g) => g.trim().toUpperCase().charAt(0))
    .pipe(z.enum(["A", "B", "C", "D", "F"])),
  issues: z.array(z.string()).default([]),
  summary: z.string().default(""),
});

export interface LlmReviewerOptions {
  provider: LLMProvider;
  model: string;
  logger: Logger;
  usage?: UsageTracker;
}

export class LlmReviewer implements CodeReviewer {
  private readonly repair: OutputRepair;

  constructor(private options: LlmReviewerOptions) {
    this.repair = new OutputRepair(options.logger, {
      llm: { provider: options.provider, model: options.model },
      usage: options.usage,
    });
  }

  async review(input: ReviewInput, signal?: AbortSignal): Promise<ReviewResult> {
    const response = await this.options.provider.chat({
      model: this.options.model,
      system: REVIEW_SYSTEM_PROMPT,
      messages: [{ role: "user", content: buildReviewPrompt(input) }],
      maxTokens: 1024,
      temperature: 0,
      signal,
    });
    this.options.usage?.track(response.provider, response.model, response.usage, "review");

    const parsed = await this.repair.tryParseJson(response.text ?? "", signal);
    if (!parsed) {
      throw new Error("Reviewer returned unparsable output");
    }

    const result = ReviewSchema.safeParse(parsed);
    if (!result.success) {
      throw new Error(`Reviewer output failed validation: ${result.error.issues[0]?.message ?? "unknown"}`);
    }
    return result.data;
  }
}
