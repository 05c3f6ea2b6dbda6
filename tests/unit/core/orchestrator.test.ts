import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Orchestrator, type OrchestratorDeps } from "../../../src/core/orchestrator.js";
import { ConversionRouter } from "../../../src/core/conversion/conversion-router.js";
import { SharedMemoryStore } from "../../../src/core/memory/shared-memory-store.js";
import { RepairLoop } from "../../../src/core/repair/repair-loop.js";
import { UnresolvedReportWriter } from "../../../src/core/reporting/unresolved-reports.js";
import { ConnectivityError } from "../../../src/core/errors.js";
import type {
  CodeReviewer,
  DeployOutcome,
  FallbackTranslator,
  MetadataRefresher,
  PrimaryConverter,
} from "../../../src/core/collaborators.js";
import type { ObjectDescription } from "../../../src/core/types.js";
import {
  createFakePrimary,
  createFakeSource,
  createFakeTranslator,
  createMockLogger,
  createScriptedDeployer,
} from "../../helpers/mocks.js";
import { createObject, fixedClock, SAMPLE_PROCEDURE, SAMPLE_TABLE_DDL } from "../../helpers/fixtures.js";
import type { Logger } from "../../../src/utils/logger.js";

const SYNTAX_ERROR = '[42601] syntax error at or near "IS"';

const EMPLOYEES_DESCRIPTION: ObjectDescription = {
  database: "migrated",
  schema: "public",
  name: "employees",
  columns: [
    { name: "employee_id", dataType: "integer", nullable: false, isIdentity: true },
    { name: "last_name", dataType: "character varying", nullable: false, isIdentity: false },
  ],
  constraints: ["PRIMARY KEY employees_pkey"],
};

describe("Orchestrator", () => {
  let dir: string;
  let logger: Logger;
  let memory: SharedMemoryStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "orchestrator-test-"));
    logger = createMockLogger();
    memory = new SharedMemoryStore({ path: join(dir, "memory.json"), logger, now: fixedClock() });
    await memory.load();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  interface HarnessOptions {
    deployOutcomes?: DeployOutcome[];
    primary?: PrimaryConverter;
    translator?: FallbackTranslator;
    metadata?: MetadataRefresher;
    reviewer?: CodeReviewer;
    maxAttempts?: number;
  }

  function createHarness(options: HarnessOptions = {}) {
    const source = createFakeSource({
      "HR.EMPLOYEES": SAMPLE_TABLE_DDL,
      "HR.RAISE_SALARY": SAMPLE_PROCEDURE,
    });
    const deployer = createScriptedDeployer(options.deployOutcomes ?? [{ ok: true }]);
    const translator = options.translator ?? createFakeTranslator();
    const maxAttempts = options.maxAttempts ?? 3;

    const deps: OrchestratorDeps = {
      source,
      router: new ConversionRouter({
        primary: options.primary ?? createFakePrimary(),
        fallback: translator,
        memory,
        logger,
      }),
      repairLoop: new RepairLoop({ translator, memory, logger, maxAttempts, now: fixedClock() }),
      deployer,
      memory,
      reports: new UnresolvedReportWriter({
        dir: join(dir, "unresolved"),
        memory,
        logger,
        maxAttempts,
        targetSchema: "public",
        now: fixedClock(),
      }),
      logger,
      ...(options.metadata ? { metadata: options.metadata } : {}),
      ...(options.reviewer ? { reviewer: options.reviewer } : {}),
      settings: { sourceSchemas: ["HR"], targetSchema: "public" },
      runId: "run-1",
      now: fixedClock(),
    };
    return { orchestrator: new Orchestrator(deps), source, deployer, translator };
  }

  it("deploys an object, rewriting source schema qualifiers", async () => {
    const { orchestrator, deployer } = createHarness();

    const result = await orchestrator.run(createObject("EMPLOYEES"));

    expect(result.status).toBe("Deployed");
    expect(result.attempts).toHaveLength(1);
    const deployed = deployer.deployMock.mock.calls[0]?.[0];
    expect(deployed).toContain("CREATE TABLE public.EMPLOYEES (");
    expect(deployed).not.toContain("HR.");
  });

  it("merges refreshed metadata into memory after a deployment", async () => {
    const metadata: MetadataRefresher = { describe: vi.fn(async () => EMPLOYEES_DESCRIPTION) };
    const { orchestrator } = createHarness({ metadata });

    await orchestrator.run(createObject("EMPLOYEES"));

    expect(memory.getSchema("migrated", "public")?.exists).toBe(true);
    expect(memory.getIdentityColumns("EMPLOYEES")).toEqual(["employee_id"]);
    expect(memory.getTableMapping("EMPLOYEES")).toEqual({ targetSchema: "public", targetName: "employees" });
  });

  it("keeps the object Deployed when metadata refresh fails", async () => {
    const metadata: MetadataRefresher = {
      describe: async () => {
        throw new Error("catalog query failed");
      },
    };
    const { orchestrator } = createHarness({ metadata });

    const result = await orchestrator.run(createObject("EMPLOYEES"));

    expect(result.status).toBe("Deployed");
    expect(logger.warn).toHaveBeenCalledWith({ error: "catalog query failed" }, "Metadata refresh failed");
  });

  it("writes one report holding every attempt when repair is exhausted", async () => {
    const { orchestrator } = createHarness({ deployOutcomes: [{ ok: false, error: SYNTAX_ERROR }] });

    const result = await orchestrator.run(createObject("EMPLOYEES"));

    expect(result.status).toBe("Unresolved");
    expect(result.reason).toBe("repair-exhausted");
    expect(result.attempts).toHaveLength(3);
    expect(result.reportId).toBe("EMPLOYEES_20250314_092653");

    const files = await readdir(join(dir, "unresolved"));
    expect(files).toEqual(["EMPLOYEES_20250314_092653.json"]);
    const report = JSON.parse(await readFile(join(dir, "unresolved", files[0] ?? ""), "utf-8"));
    expect(report.reason).toBe("repair-exhausted");
    expect(report.attempts).toHaveLength(3);
    expect(report.finalError).toBe(SYNTAX_ERROR);
    expect(report.identity).toEqual({ name: "EMPLOYEES", schema: "HR" });
  });

  it("ends Unresolved with fetch-failed when the source has no definition", async () => {
    const { orchestrator, deployer } = createHarness();

    const result = await orchestrator.run(createObject("MISSING_TABLE"));

    expect(result.status).toBe("Unresolved");
    expect(result.reason).toBe("fetch-failed");
    expect(result.attempts).toEqual([]);
    expect(result.reportId).toBe("MISSING_TABLE_20250314_092653");
    expect(deployer.deployMock).not.toHaveBeenCalled();
    expect(memory.getPatterns("Table", "failure")[0]?.fixSummary).toBe(
      "fetch-failed: Fetch failed: not exported: MISSING_TABLE"
    );
  });

  it("ends Unresolved with conversion-failed when both converters fail", async () => {
    const { orchestrator, deployer } = createHarness({
      primary: createFakePrimary({ errorCount: 1 }),
      translator: {
        translate: async () => {
          throw new Error("provider unavailable");
        },
      },
    });

    const result = await orchestrator.run(createObject("EMPLOYEES"));

    expect(result.status).toBe("Unresolved");
    expect(result.reason).toBe("conversion-failed");
    expect(deployer.deployMock).not.toHaveBeenCalled();
  });

  it("folds the review grade into the success pattern", async () => {
    const reviewer: CodeReviewer = {
      review: async () => ({ grade: "B", issues: ["NUMERIC precision"], summary: "fine" }),
    };
    const { orchestrator } = createHarness({ reviewer });

    await orchestrator.run(createObject("EMPLOYEES"));

    expect(memory.getPatterns("Table", "success")[0]?.fixSummary).toBe("deployed on first attempt (review B)");
  });

  it("treats a failing reviewer as advisory", async () => {
    const reviewer: CodeReviewer = {
      review: async () => {
        throw new Error("review parse failed");
      },
    };
    const { orchestrator } = createHarness({ reviewer });

    const result = await orchestrator.run(createObject("EMPLOYEES"));

    expect(result.status).toBe("Deployed");
    expect(memory.getPatterns("Table", "success")[0]?.fixSummary).toBe("deployed on first attempt");
  });

  describe("runBatch", () => {
    it("summarizes a mixed batch by kind", async () => {
      const { orchestrator } = createHarness({
        deployOutcomes: [{ ok: true }, { ok: false, error: SYNTAX_ERROR }],
        maxAttempts: 1,
      });

      const summary = await orchestrator.runBatch([
        createObject("EMPLOYEES", "Table"),
        createObject("RAISE_SALARY", "Procedure"),
      ]);

      expect(summary.runId).toBe("run-1");
      expect(summary.total).toBe(2);
      expect(summary.migrated).toBe(1);
      expect(summary.failed).toBe(1);
      expect(summary.skipped).toBe(0);
      expect(summary.cancelled).toBe(false);
      expect(summary.byKind.Table).toEqual({ migrated: 1, failed: 0 });
      expect(summary.byKind.Procedure).toEqual({ migrated: 0, failed: 1 });
      expect(summary.failures).toEqual([
        {
          object: "HR.RAISE_SALARY",
          kind: "Procedure",
          reason: "repair-exhausted",
          reportId: "RAISE_SALARY_20250314_092653",
        },
      ]);
    });

    it("persists memory after the batch", async () => {
      const { orchestrator } = createHarness();
      await orchestrator.runBatch([createObject("EMPLOYEES")]);

      const stored = JSON.parse(await readFile(join(dir, "memory.json"), "utf-8"));
      expect(stored.patterns).toHaveLength(1);
      expect(stored.patterns[0].objectName).toBe("EMPLOYEES");
    });

    it("fails fast when the source is unreachable", async () => {
      const { orchestrator, source, deployer } = createHarness();
      source.pingMock.mockRejectedValueOnce(new Error("ENOENT: export dir missing"));

      const run = orchestrator.runBatch([createObject("EMPLOYEES")]);

      await expect(run).rejects.toThrow(ConnectivityError);
      await expect(run).rejects.toMatchObject({ endpoint: "source" });
      expect(source.fetchMock).not.toHaveBeenCalled();
      expect(deployer.deployMock).not.toHaveBeenCalled();
    });

    it("fails fast when the target is unreachable", async () => {
      const { orchestrator, deployer } = createHarness();
      deployer.pingMock.mockRejectedValueOnce(new Error("connection refused"));

      await expect(orchestrator.runBatch([createObject("EMPLOYEES")])).rejects.toMatchObject({
        endpoint: "target",
        message: "Target unreachable: connection refused",
      });
    });

    it("stops between objects once the signal is aborted", async () => {
      const { orchestrator, source } = createHarness();
      const controller = new AbortController();
      controller.abort();

      const summary = await orchestrator.runBatch(
        [createObject("EMPLOYEES"), createObject("RAISE_SALARY", "Procedure")],
        { signal: controller.signal }
      );

      expect(summary.cancelled).toBe(true);
      expect(summary.skipped).toBe(2);
      expect(source.fetchMock).not.toHaveBeenCalled();
    });

    it("discards the in-flight object when cancelled during deployment", async () => {
      const controller = new AbortController();
      const { orchestrator, deployer } = createHarness();
      deployer.deployMock.mockImplementationOnce(async () => {
        controller.abort();
        return { ok: false, error: SYNTAX_ERROR };
      });

      const summary = await orchestrator.runBatch(
        [createObject("EMPLOYEES"), createObject("RAISE_SALARY", "Procedure")],
        { signal: controller.signal }
      );

      expect(summary.cancelled).toBe(true);
      expect(summary.migrated).toBe(0);
      expect(summary.failed).toBe(0);
      expect(summary.skipped).toBe(2);
      expect(deployer.deployMock).toHaveBeenCalledTimes(1);
      expect(await readdir(dir)).toEqual(["memory.json"]);
    });
  });
});
