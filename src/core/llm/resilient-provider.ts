/**
 * Retries transient provider failures (429, 5xx, overloaded, dropped
 * connections) with backoff. A `retry-after` header stretches the wait, up to
 * MAX_RETRY_AFTER_MS. Cancellation ends the wait at once and is never retried.
 */
import type { LLMProvider, LLMChatParams, LLMResponse } from "./provider.js";
import { MigrationCancelledError } from "../errors.js";
import { isRecord } from "../../utils/guards.js";
import type { Logger } from "../../utils/logger.js";

const DEFAULT_RETRY_DELAYS = [1_000, 3_000, 8_000]; // ms
const MAX_RETRY_AFTER_MS = 30_000;

function statusOf(error: Error): number | undefined {
  return "status" in error && typeof error.status === "number" ? error.status : undefined;
}

/** Seconds from an SDK error's `retry-after` header, in ms. */
export function retryAfterMs(error: Error): number | undefined {
  const headers = "headers" in error && isRecord(error.headers) ? error.headers : undefined;
  const value = headers?.["retry-after"];
  if (typeof value !== "string") return undefined;
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0) return undefined;
  return Math.min(seconds * 1_000, MAX_RETRY_AFTER_MS);
}

export function isRetryable(error: Error): boolean {
  const status = statusOf(error);
  if (status !== undefined) return status === 408 || status === 429 || status >= 500;

  const msg = error.message.toLowerCase();
  return (
    msg.includes("rate limit") ||
    msg.includes("overloaded") ||
    msg.includes("econnreset") ||
    msg.includes("socket hang up") ||
    /\b(?:429|50[0234])\b/.test(msg)
  );
}

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new MigrationCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new MigrationCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export class ResilientLLMProvider implements LLMProvider {
  readonly name: string;

  constructor(
    private inner: LLMProvider,
    private logger: Logger,
    private retryDelays: readonly number[] = DEFAULT_RETRY_DELAYS
  ) {
    this.name = inner.name;
  }

  async chat(params: LLMChatParams): Promise<LLMResponse> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.inner.chat(params);
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        const delay = this.retryDelays[attempt];
        if (delay === undefined || params.signal?.aborted || !isRetryable(error)) {
          throw error;
        }

        const waitMs = Math.max(delay, retryAfterMs(error) ?? 0);
        this.logger.debug(
          { provider: this.name, attempt: attempt + 1, delay: waitMs, error: error.message },
          "Retrying LLM request"
        );
        await wait(waitMs, params.signal);
      }
    }
  }
}
