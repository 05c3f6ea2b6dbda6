/**
 * Timeouts and transient-error retries for calls to external collaborators.
 */
import { TimeoutError } from "./errors.js";
import type { Logger } from "../utils/logger.js";

export interface ExecutionOptions {
  timeout: number;
  retries: number;
  operation: string;
}

/** Race `fn` against a timer; rejects with TimeoutError when the timer wins. */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  try {
    return await Promise.race([
      fn(),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
      }),
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export class ResilientExecutor {
  static async execute<T>(
    fn: () => Promise<T>,
    options: ExecutionOptions,
    logger: Logger
  ): Promise<T> {
    let lastError: Error | undefined;

    for (let attempt = 0; attempt <= options.retries; attempt++) {
      try {
        return await withTimeout(fn, options.timeout, options.operation);
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err));

        if (attempt < options.retries && this.isTransient(lastError)) {
          logger.debug(
            { operation: options.operation, attempt: attempt + 1, error: lastError.message },
            "Retrying after transient error"
          );
          continue;
        }

        break;
      }
    }

    throw lastError ?? new Error(`${options.operation} failed`);
  }

  static isTransient(error: Error): boolean {
    const message = error.message.toLowerCase();
    const code = "code" in error ? error.code : undefined;

    // Network errors
    if (code === "ECONNREFUSED") return true;
    if (code === "ETIMEDOUT") return true;
    if (code === "ECONNRESET") return true;
    if (code === "EAI_AGAIN") return true;

    // File locks on exported sources
    if (code === "EBUSY") return true;

    if (error instanceof TimeoutError) return true;
    if (message.includes("timed out")) return true;

    return false;
  }
}
