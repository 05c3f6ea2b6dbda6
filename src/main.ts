import { ZodError } from "zod";
import { loadConfig, type AppConfig } from "./utils/config.js";
import { createLogger, type Logger } from "./utils/logger.js";
import { createTranslatorModel } from "./core/llm/factory.js";
import type { LLMProvider } from "./core/llm/provider.js";
import { UsageTracker } from "./core/llm/usage.js";
import { SharedMemoryStore } from "./core/memory/shared-memory-store.js";
import { ConversionRouter } from "./core/conversion/conversion-router.js";
import { RuleBasedConverter } from "./core/conversion/rule-converter.js";
import { CommandConverter } from "./core/conversion/command-converter.js";
import { RepairLoop } from "./core/repair/repair-loop.js";
import { UnresolvedReportWriter } from "./core/reporting/unresolved-reports.js";
import { formatSummary } from "./core/reporting/summary.js";
import { LlmTranslator } from "./core/translation/llm-translator.js";
import { LlmReviewer } from "./core/translation/reviewer.js";
import { Orchestrator } from "./core/orchestrator.js";
import { loadManifest } from "./core/manifest.js";
import { ConnectivityError, errorMessage } from "./core/errors.js";
import { describeTarget } from "./core/credentials.js";
import type { PrimaryConverter, WebSearch } from "./core/collaborators.js";
import { FileSourceCatalog } from "./integrations/source/file-source-catalog.js";
import { PostgresTarget, createTargetClient } from "./integrations/target/postgres-target.js";
import { FirecrawlClient } from "./integrations/search/firecrawl-client.js";
import { FirecrawlWebSearch } from "./integrations/search/firecrawl-web-search.js";

const logger = createLogger();

const EXIT_OK = 0;
const EXIT_SETUP = 1;
const EXIT_UNRESOLVED = 2;
const EXIT_CANCELLED = 130;

function createConverter(config: AppConfig, log: Logger): PrimaryConverter {
  const { converter, timeouts } = config;
  if (converter.type === "command" && converter.command) {
    return new CommandConverter({
      command: converter.command,
      args: converter.args,
      logger: log.child({ component: "converter" }),
      timeoutMs: timeouts.convert_ms,
    });
  }
  return new RuleBasedConverter();
}

function createSearch(config: AppConfig): WebSearch | undefined {
  const { search, timeouts } = config;
  if (!search.enabled) return undefined;
  if (!search.api_key) {
    logger.warn("Web search enabled without an API key, repairing without it");
    return undefined;
  }
  const client = new FirecrawlClient({
    apiUrl: search.api_url,
    apiKey: search.api_key,
    timeoutMs: timeouts.search_ms,
  });
  return new FirecrawlWebSearch(client, search.max_results);
}

async function main(): Promise<number> {
  logger.info("Starting schema migrator...");

  // 1. Load configuration and manifest
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    const detail =
      err instanceof ZodError
        ? err.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
        : errorMessage(err);
    logger.fatal({ error: detail }, "Invalid configuration");
    return EXIT_SETUP;
  }

  const manifestPath = process.argv[2] ?? process.env.MANIFEST_PATH ?? "./config/manifest.yaml";
  const objects = await loadManifest(manifestPath);
  logger.info({ manifest: manifestPath, objects: objects.length }, "Manifest loaded");

  // 2. LLM provider and usage tracking
  let provider: LLMProvider;
  let model: string;
  try {
    ({ provider, model } = createTranslatorModel(config.llm, logger.child({ component: "llm" })));
  } catch (err) {
    logger.fatal({ error: errorMessage(err) }, "LLM provider setup failed");
    return EXIT_SETUP;
  }
  const usage = new UsageTracker(config.llm.cost_per_million_tokens ?? {});

  // 3. Shared memory
  const memory = new SharedMemoryStore({
    path: config.memory.path,
    logger: logger.child({ component: "memory" }),
  });
  await memory.load();

  // 4. Collaborators
  const source = new FileSourceCatalog({
    exportDir: config.source.export_dir,
    logger: logger.child({ component: "source" }),
  });
  const sql = createTargetClient(config.target, logger);
  const target = new PostgresTarget({
    sql,
    database: config.target.database,
    targetSchema: config.migration.target_schema,
    logger: logger.child({ component: "target" }),
  });
  logger.info({ target: describeTarget(config.target) }, "Target configured");

  const translator = new LlmTranslator({
    provider,
    model,
    logger: logger.child({ component: "translator" }),
    usage,
    maxTokens: config.llm.max_tokens,
  });
  const reviewer = config.migration.review_enabled
    ? new LlmReviewer({ provider, model, logger: logger.child({ component: "reviewer" }), usage })
    : undefined;
  const search = createSearch(config);

  // 5. Engine
  const router = new ConversionRouter({
    primary: createConverter(config, logger),
    fallback: translator,
    memory,
    logger: logger.child({ component: "router" }),
    warningThreshold: config.migration.warning_threshold,
    patternLimit: config.migration.pattern_limit,
    primaryTimeoutMs: config.timeouts.convert_ms,
    fallbackTimeoutMs: config.timeouts.translate_ms,
  });
  const repairLoop = new RepairLoop({
    translator,
    memory,
    logger: logger.child({ component: "repair" }),
    ...(search ? { search } : {}),
    maxAttempts: config.migration.max_attempts,
    deployTimeoutMs: config.timeouts.deploy_ms,
    translateTimeoutMs: config.timeouts.translate_ms,
    searchTimeoutMs: config.timeouts.search_ms,
  });
  const reports = new UnresolvedReportWriter({
    dir: config.reports.unresolved_dir,
    memory,
    logger: logger.child({ component: "reports" }),
    maxAttempts: config.migration.max_attempts,
    targetSchema: config.migration.target_schema,
  });
  const orchestrator = new Orchestrator({
    source,
    router,
    repairLoop,
    deployer: target,
    metadata: target,
    memory,
    reports,
    logger,
    ...(reviewer ? { reviewer } : {}),
    usage,
    settings: {
      flushEvery: config.migration.flush_every,
      targetSchema: config.migration.target_schema,
      sourceSchemas: config.migration.source_schemas,
      reviewEnabled: config.migration.review_enabled,
    },
    timeouts: {
      fetchMs: config.timeouts.fetch_ms,
      reviewMs: config.timeouts.review_ms,
      metadataMs: config.timeouts.metadata_ms,
    },
  });

  // 6. Cancellation
  const controller = new AbortController();
  const cancel = (signal: string) => {
    logger.warn({ signal }, "Received shutdown signal, finishing current attempt");
    controller.abort();
  };
  process.once("SIGINT", () => cancel("SIGINT"));
  process.once("SIGTERM", () => cancel("SIGTERM"));

  // 7. Run
  try {
    const summary = await orchestrator.runBatch(objects, { signal: controller.signal });
    process.stdout.write(`${formatSummary(summary)}\n`);
    logger.info({ memory: memory.stats() }, "Memory store state");
    if (summary.cancelled) return EXIT_CANCELLED;
    return summary.failed > 0 ? EXIT_UNRESOLVED : EXIT_OK;
  } catch (err) {
    if (err instanceof ConnectivityError) {
      logger.fatal({ endpoint: err.endpoint, error: err.message }, "Connectivity check failed");
      return EXIT_SETUP;
    }
    throw err;
  } finally {
    await target.close().catch((err: unknown) => {
      logger.warn({ error: errorMessage(err) }, "Failed to close target connection");
    });
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.fatal({ error: err }, "Fatal migration error");
    process.exitCode = EXIT_SETUP;
  });
