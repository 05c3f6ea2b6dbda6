/**
 * What the translator and reviewer need from a chat model: one system prompt,
 * plain-text turns, text back. No tools, no streaming.
 */

export interface LLMMessage {
  role: "user" | "assistant";
  content: string;
}

/** Token counts; null when the backend does not report them (local models). */
export interface LLMUsage {
  inputTokens: number | null;
  outputTokens: number | null;
}

/** `max_tokens` means the code in `text` is probably cut off. */
export type LLMStopReason = "end_turn" | "max_tokens";

export interface LLMResponse {
  text: string | null;
  stopReason: LLMStopReason;
  usage: LLMUsage;
  model: string;
  provider: string;
}

export interface LLMChatParams {
  model: string;
  system: string;
  messages: LLMMessage[];
  maxTokens?: number;
  /** Code generation runs at 0; omitted means the backend default. */
  temperature?: number;
  signal?: AbortSignal;
}

export interface LLMProvider {
  readonly name: string;
  chat(params: LLMChatParams): Promise<LLMResponse>;
}
