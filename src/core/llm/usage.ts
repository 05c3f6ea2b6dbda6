import type { LLMUsage } from "./provider.js";

export interface UsageRecord {
  provider: string;
  model: string;
  purpose: UsagePurpose;
  inputTokens: number | null;
  outputTokens: number | null;
  estimatedCost: number | null;
}

export type UsagePurpose = "conversion" | "repair" | "review" | "json-repair";

export interface UsageSummary {
  provider: string;
  model: string;
  totalInputTokens: number;
  totalOutputTokens: number;
  requestCount: number;
  estimatedCost: number | null;
  usageTracked: boolean;
}

export type CostRates = Record<string, { input: number; output: number }>;

/** Tracks LLM token usage and estimated cost over one migration run. */
export class UsageTracker {
  private records: UsageRecord[] = [];

  constructor(private costRates: CostRates = {}) {}

  track(provider: string, model: string, usage: LLMUsage, purpose: UsagePurpose): void {
    this.records.push({
      provider,
      model,
      purpose,
      inputTokens: usage.inputTokens,
      outputTokens: usage.outputTokens,
      estimatedCost: this.calculateCost(model, usage),
    });
  }

  /** Aggregated usage grouped by provider+model. */
  getSummary(): UsageSummary[] {
    const groups = new Map<string, UsageSummary>();

    for (const record of this.records) {
      const key = `${record.provider}:${record.model}`;
      const existing = groups.get(key);
      const tracked = record.inputTokens !== null || record.outputTokens !== null;

      if (existing) {
        existing.totalInputTokens += record.inputTokens ?? 0;
        existing.totalOutputTokens += record.outputTokens ?? 0;
        existing.requestCount++;
        existing.estimatedCost =
          existing.estimatedCost !== null && record.estimatedCost !== null
            ? existing.estimatedCost + record.estimatedCost
            : null;
        if (!tracked) existing.usageTracked = false;
      } else {
        groups.set(key, {
          provider: record.provider,
          model: record.model,
          totalInputTokens: record.inputTokens ?? 0,
          totalOutputTokens: record.outputTokens ?? 0,
          requestCount: 1,
          estimatedCost: record.estimatedCost,
          usageTracked: tracked,
        });
      }
    }

    return Array.from(groups.values());
  }

  countByPurpose(purpose: UsagePurpose): number {
    return this.records.filter((r) => r.purpose === purpose).length;
  }

  getTotalCost(): number | null {
    let total = 0;
    let hasTracked = false;
    for (const s of this.getSummary()) {
      if (s.estimatedCost !== null) {
        total += s.estimatedCost;
        hasTracked = true;
      }
    }
    return hasTracked ? total : null;
  }

  private calculateCost(model: string, usage: LLMUsage): number | null {
    if (usage.inputTokens === null && usage.outputTokens === null) {
      return null;
    }

    const rates = this.costRates[model];
    if (!rates) {
      return null;
    }

    const inputCost = ((usage.inputTokens ?? 0) / 1_000_000) * rates.input;
    const outputCost = ((usage.outputTokens ?? 0) / 1_000_000) * rates.output;

    return inputCost + outputCost;
  }
}
