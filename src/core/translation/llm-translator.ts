/**
 * Fallback translator backed by an LLM provider. Used for initial conversion
 * when the primary converter is rejected, and for patching failed deployments.
 */
import type { FallbackTranslator, TranslationRequest } from "../collaborators.js";
import type { LLMProvider } from "../llm/provider.js";
import type { UsageTracker } from "../llm/usage.js";
import type { Logger } from "../../utils/logger.js";
import { stripCodeFences } from "./output-repair.js";
import {
  CONVERT_SYSTEM_PROMPT,
  REPAIR_SYSTEM_PROMPT,
  buildTranslationPrompt,
} from "./prompts.js";

export interface LlmTranslatorOptions {
  provider: LLMProvider;
  model: string;
  logger: Logger;
  usage?: UsageTracker;
  maxTokens?: number;
}

export class LlmTranslator implements FallbackTranslator {
  constructor(private options: LlmTranslatorOptions) {}

  async translate(request: TranslationRequest, signal?: AbortSignal): Promise<string> {
    const purpose = request.repair ? "repair" : "conversion";
    const response = await this.options.provider.chat({
      model: this.options.model,
      system: request.repair ? REPAIR_SYSTEM_PROMPT : CONVERT_SYSTEM_PROMPT,
      messages: [{ role: "user", content: buildTranslationPrompt(request) }],
      maxTokens: this.options.maxTokens ?? 8192,
      temperature: 0,
      signal,
    });
    this.options.usage?.track(response.provider, response.model, response.usage, purpose);

    if (response.stopReason === "max_tokens") {
      this.options.logger.warn(
        { object: request.objectName, purpose },
        "Translator output hit the token limit"
      );
    }

    const text = response.text ? stripCodeFences(response.text) : "";
    if (!text) {
      throw new Error(`Translator returned no code for ${request.objectName}`);
    }
    return text;
  }
}
