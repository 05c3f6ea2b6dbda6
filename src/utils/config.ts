import { readFileSync, existsSync } from "node:fs";
import yaml from "js-yaml";
import { z } from "zod";
import { TargetCredentialsSchema } from "../core/credentials.js";
import { isRecord } from "./guards.js";

const ProviderConfigSchema = z.object({
  type: z.enum(["anthropic", "openai_compat"]),
  api_key: z.string(),
  base_url: z.string().optional(),
  models: z.array(z.string()),
  default_headers: z.record(z.string()).optional(),
});

const LLMConfigSchema = z
  .object({
    default_provider: z.string(),
    default_model: z.string(),
    providers: z.record(ProviderConfigSchema),
    max_tokens: z.number().int().positive().default(8192),
    cost_per_million_tokens: z
      .record(z.object({ input: z.number(), output: z.number() }))
      .optional(),
  })
  .refine((llm) => llm.default_provider in llm.providers, {
    message: "llm.default_provider must name a configured provider",
    path: ["default_provider"],
  });

const MigrationConfigSchema = z.object({
  max_attempts: z.number().int().min(1).max(10).default(3),
  warning_threshold: z.number().int().min(0).default(5),
  pattern_limit: z.number().int().min(0).default(5),
  flush_every: z.number().int().min(1).default(1),
  review_enabled: z.boolean().default(true),
  target_schema: z.string().default("public"),
  source_schemas: z.array(z.string()).default(["APP", "HR", "SCOTT"]),
});

const TimeoutsConfigSchema = z.object({
  fetch_ms: z.number().int().positive().default(30_000),
  convert_ms: z.number().int().positive().default(120_000),
  translate_ms: z.number().int().positive().default(180_000),
  review_ms: z.number().int().positive().default(60_000),
  deploy_ms: z.number().int().positive().default(60_000),
  search_ms: z.number().int().positive().default(15_000),
  metadata_ms: z.number().int().positive().default(30_000),
});

const ConverterConfigSchema = z
  .object({
    type: z.enum(["rules", "command"]).default("rules"),
    command: z.string().optional(),
    args: z.array(z.string()).default([]),
  })
  .refine((c) => c.type !== "command" || Boolean(c.command), {
    message: "converter.command is required when converter.type is 'command'",
    path: ["command"],
  });

const SearchConfigSchema = z.object({
  enabled: z.boolean().default(false),
  api_url: z.string().default("https://api.firecrawl.dev"),
  api_key: z.string().optional(),
  max_results: z.number().int().min(1).max(10).default(3),
});

const AppConfigSchema = z.object({
  llm: LLMConfigSchema,
  target: TargetCredentialsSchema,
  migration: MigrationConfigSchema.default({}),
  timeouts: TimeoutsConfigSchema.default({}),
  converter: ConverterConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  source: z.object({ export_dir: z.string().default("./source") }).default({}),
  memory: z.object({ path: z.string().default("./data/migration_memory.json") }).default({}),
  reports: z.object({ unresolved_dir: z.string().default("./reports/unresolved") }).default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;

/**
 * Load configuration from YAML file with environment variable overrides.
 * Env vars take precedence over YAML values for sensitive fields.
 */
export function loadConfig(configPath?: string): AppConfig {
  const path = configPath ?? process.env.CONFIG_PATH ?? "./config/config.yaml";

  let rawConfig: Record<string, unknown> = {};

  if (existsSync(path)) {
    const loaded: unknown = yaml.load(readFileSync(path, "utf-8"));
    if (isRecord(loaded)) rawConfig = loaded;
  }

  applyEnvOverrides(rawConfig);

  return AppConfigSchema.parse(rawConfig);
}

function applyEnvOverrides(config: Record<string, unknown>): void {
  const llm = ensureObject(config, "llm");
  const providers = ensureObject(llm, "providers");
  const target = ensureObject(config, "target");
  const migration = ensureObject(config, "migration");

  // Target database
  if (process.env.TARGET_DATABASE_URL) target.url = process.env.TARGET_DATABASE_URL;
  if (process.env.TARGET_DB_PASSWORD) target.password = process.env.TARGET_DB_PASSWORD;

  // Migration knobs
  if (process.env.MIGRATION_MAX_ATTEMPTS) {
    migration.max_attempts = parseInt(process.env.MIGRATION_MAX_ATTEMPTS, 10);
  }
  if (process.env.MIGRATION_TARGET_SCHEMA) {
    migration.target_schema = process.env.MIGRATION_TARGET_SCHEMA;
  }

  if (process.env.MEMORY_PATH) ensureObject(config, "memory").path = process.env.MEMORY_PATH;
  if (process.env.UNRESOLVED_DIR) {
    ensureObject(config, "reports").unresolved_dir = process.env.UNRESOLVED_DIR;
  }
  if (process.env.SOURCE_EXPORT_DIR) {
    ensureObject(config, "source").export_dir = process.env.SOURCE_EXPORT_DIR;
  }

  // Web search
  if (process.env.FIRECRAWL_API_KEY || process.env.FIRECRAWL_API_URL) {
    const search = ensureObject(config, "search");
    if (process.env.FIRECRAWL_API_KEY) {
      search.api_key = process.env.FIRECRAWL_API_KEY;
      if (search.enabled === undefined) search.enabled = true;
    }
    if (process.env.FIRECRAWL_API_URL) search.api_url = process.env.FIRECRAWL_API_URL;
  }

  // LLM provider API key overrides
  if (process.env.ANTHROPIC_API_KEY) {
    const anthropic = ensureObject(providers, "anthropic");
    anthropic.api_key = process.env.ANTHROPIC_API_KEY;
    if (!anthropic.type) anthropic.type = "anthropic";
    if (!anthropic.models) anthropic.models = ["claude-sonnet-4-5-20250514"];
  }

  if (process.env.OPENAI_API_KEY) {
    const openai = ensureObject(providers, "openai");
    openai.api_key = process.env.OPENAI_API_KEY;
    if (!openai.type) openai.type = "openai_compat";
    if (!openai.base_url) openai.base_url = "https://api.openai.com/v1";
    if (!openai.models) openai.models = ["gpt-4o"];
  }

  if (process.env.OPENROUTER_API_KEY) {
    const openrouter = ensureObject(providers, "openrouter");
    openrouter.api_key = process.env.OPENROUTER_API_KEY;
    if (!openrouter.type) openrouter.type = "openai_compat";
    if (!openrouter.base_url) openrouter.base_url = "https://openrouter.ai/api/v1";
    if (!openrouter.models) openrouter.models = ["anthropic/claude-sonnet-4-5"];
  }

  // Set defaults for llm config
  if (!llm.default_provider) {
    llm.default_provider = Object.keys(providers)[0] ?? "anthropic";
  }
  if (!llm.default_model) {
    const defaultProvider =
      typeof llm.default_provider === "string" ? providers[llm.default_provider] : undefined;
    const models = isRecord(defaultProvider) ? defaultProvider.models : undefined;
    const first: unknown = Array.isArray(models) ? models[0] : undefined;
    llm.default_model = typeof first === "string" ? first : "claude-sonnet-4-5-20250514";
  }
}

function ensureObject(
  parent: Record<string, unknown>,
  key: string
): Record<string, unknown> {
  const existing = parent[key];
  if (isRecord(existing)) return existing;
  const created: Record<string, unknown> = {};
  parent[key] = created;
  return created;
}
