/**
 * Thin HTTP client for the Firecrawl REST API v1 search endpoint.
 * Uses native fetch, no SDK dependency.
 */
import { z } from "zod";

export interface FirecrawlClientOptions {
  apiUrl: string;
  apiKey?: string;
  timeoutMs: number;
}

export interface SearchParams {
  query: string;
  limit?: number;
  lang?: string;
  country?: string;
}

const SearchResultSchema = z.object({
  success: z.boolean(),
  data: z
    .array(
      z.object({
        url: z.string().optional(),
        markdown: z.string().optional(),
        title: z.string().optional(),
        description: z.string().optional(),
      })
    )
    .optional(),
  error: z.string().optional(),
});

export type SearchResult = z.infer<typeof SearchResultSchema>;

export class FirecrawlClient {
  private apiUrl: string;
  private apiKey?: string;
  private timeoutMs: number;

  constructor(options: FirecrawlClientOptions) {
    this.apiUrl = options.apiUrl.replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
  }

  async search(params: SearchParams, signal?: AbortSignal): Promise<SearchResult> {
    const raw = await this.post(
      "/v1/search",
      {
        query: params.query,
        limit: params.limit ?? 5,
        lang: params.lang,
        country: params.country,
      },
      signal
    );
    if ("transportError" in raw) {
      return { success: false, error: raw.transportError };
    }
    const parsed = SearchResultSchema.safeParse(raw.body);
    if (!parsed.success) {
      return { success: false, error: "Unexpected search response shape" };
    }
    return parsed.data;
  }

  private async post(
    path: string,
    body: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<{ body: unknown } | { transportError: string }> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const headers: Record<string, string> = {
        "Content-Type": "application/json",
      };
      if (this.apiKey) {
        headers["Authorization"] = `Bearer ${this.apiKey}`;
      }

      const res = await fetch(`${this.apiUrl}${path}`, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      if (!res.ok) {
        const text = await res.text().catch(() => "");
        return { transportError: `HTTP ${res.status}: ${text}` };
      }

      const json: unknown = await res.json();
      return { body: json };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { transportError: message };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
