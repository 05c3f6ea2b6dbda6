import Anthropic from "@anthropic-ai/sdk";
import type { LLMProvider, LLMChatParams, LLMResponse } from "./provider.js";

export class AnthropicProvider implements LLMProvider {
  readonly name = "anthropic";
  private client: Anthropic;

  constructor(apiKey: string, baseURL?: string) {
    this.client = new Anthropic({ apiKey, ...(baseURL ? { baseURL } : {}) });
  }

  async chat(params: LLMChatParams): Promise<LLMResponse> {
    const response = await this.client.messages.create(
      {
        model: params.model,
        max_tokens: params.maxTokens ?? 4096,
        system: params.system,
        messages: params.messages.map((m) => ({ role: m.role, content: m.content })),
        ...(params.temperature !== undefined ? { temperature: params.temperature } : {}),
      },
      { signal: params.signal }
    );

    return this.toResponse(response, params.model);
  }

  private toResponse(response: Anthropic.Message, model: string): LLMResponse {
    const parts: string[] = [];
    for (const block of response.content) {
      if (block.type === "text") parts.push(block.text);
    }

    return {
      text: parts.length > 0 ? parts.join("\n") : null,
      stopReason: response.stop_reason === "max_tokens" ? "max_tokens" : "end_turn",
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
      model,
      provider: this.name,
    };
  }
}
