import type { SearchHit, WebSearch } from "../../core/collaborators.js";
import type { ObjectKind } from "../../core/types.js";
import type { FirecrawlClient } from "./firecrawl-client.js";

const SNIPPET_LIMIT = 500;

const KIND_TERMS: Record<ObjectKind, string> = {
  Table: "create table",
  Procedure: "procedure",
  Function: "function",
  Trigger: "trigger",
  PackageMember: "function",
};

/** Web search for deployment errors, backed by Firecrawl. */
export class FirecrawlWebSearch implements WebSearch {
  constructor(
    private client: FirecrawlClient,
    private maxResults = 3
  ) {}

  async search(query: string, kind: ObjectKind, signal?: AbortSignal): Promise<SearchHit[]> {
    const result = await this.client.search(
      { query: `postgresql ${KIND_TERMS[kind]} error ${query}`, limit: this.maxResults },
      signal
    );
    if (!result.success) {
      throw new Error(`Firecrawl search failed: ${result.error ?? "unknown error"}`);
    }

    const hits: SearchHit[] = [];
    for (const item of result.data ?? []) {
      if (!item.url) continue;
      hits.push({
        title: item.title ?? item.url,
        url: item.url,
        snippet: (item.description ?? item.markdown ?? "").slice(0, SNIPPET_LIMIT),
      });
    }
    return hits.slice(0, this.maxResults);
  }
}
