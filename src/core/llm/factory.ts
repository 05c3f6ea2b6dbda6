import type { LLMProvider } from "./provider.js";
import { AnthropicProvider } from "./anthropic.js";
import { OpenAICompatProvider } from "./openai-compat.js";
import { ResilientLLMProvider } from "./resilient-provider.js";
import type { LLMConfig, ProviderConfig } from "../../utils/config.js";
import type { Logger } from "../../utils/logger.js";

/** Build the adapter for one `llm.providers` entry. */
export function createProvider(name: string, config: ProviderConfig): LLMProvider {
  switch (config.type) {
    case "anthropic":
      return new AnthropicProvider(config.api_key, config.base_url);

    case "openai_compat":
      return new OpenAICompatProvider({
        baseURL: config.base_url,
        apiKey: config.api_key,
        name,
        defaultHeaders: config.default_headers,
      });
  }
}

export interface TranslatorModel {
  provider: LLMProvider;
  model: string;
}

/**
 * The provider and model every translation, repair and review call goes
 * through, wrapped with retries.
 */
export function createTranslatorModel(llm: LLMConfig, logger: Logger): TranslatorModel {
  const config = llm.providers[llm.default_provider];
  if (!config) {
    throw new Error(`LLM provider "${llm.default_provider}" is not configured`);
  }
  if (!config.models.includes(llm.default_model)) {
    logger.warn(
      { provider: llm.default_provider, model: llm.default_model },
      "Default model is not listed for its provider"
    );
  }
  return {
    provider: new ResilientLLMProvider(createProvider(llm.default_provider, config), logger),
    model: llm.default_model,
  };
}
