import { describe, it, expect, beforeEach } from "vitest";
import { LlmTranslator } from "../../../../src/core/translation/llm-translator.js";
import { CONVERT_SYSTEM_PROMPT, REPAIR_SYSTEM_PROMPT } from "../../../../src/core/translation/prompts.js";
import { UsageTracker } from "../../../../src/core/llm/usage.js";
import type { TranslationRequest } from "../../../../src/core/collaborators.js";
import { createMockLogger, createMockProvider } from "../../../helpers/mocks.js";
import { createTextResponse } from "../../../helpers/fixtures.js";
import type { Logger } from "../../../../src/utils/logger.js";

const CONVERSION: TranslationRequest = {
  objectName: "EMPLOYEES",
  kind: "Table",
  sourceText: "CREATE TABLE EMPLOYEES (ID NUMBER);",
  patterns: [],
};

const REPAIR: TranslationRequest = {
  ...CONVERSION,
  repair: {
    currentText: "CREATE TABLE employees (id numeric);",
    rawError: "[42601] syntax error",
    errorKind: "syntax",
    memoryHits: [],
    searchHits: [],
    previousErrors: [],
    identityColumns: [],
  },
};

describe("LlmTranslator", () => {
  let logger: Logger;
  let usage: UsageTracker;

  beforeEach(() => {
    logger = createMockLogger();
    usage = new UsageTracker();
  });

  it("converts with the conversion prompt and strips fences", async () => {
    const provider = createMockProvider({
      responses: [createTextResponse("```sql\nCREATE TABLE employees (id integer);\n```")],
    });
    const translator = new LlmTranslator({ provider, model: "mock-model", logger, usage });

    const text = await translator.translate(CONVERSION);

    expect(text).toBe("CREATE TABLE employees (id integer);");
    const params = provider.chatMock.mock.calls[0]?.[0];
    expect(params.system).toBe(CONVERT_SYSTEM_PROMPT);
    expect(params.maxTokens).toBe(8192);
    expect(params.temperature).toBe(0);
    expect(params.messages[0].content.startsWith("Object: EMPLOYEES (Table)")).toBe(true);
    expect(usage.countByPurpose("conversion")).toBe(1);
  });

  it("uses the repair prompt when repair context is present", async () => {
    const provider = createMockProvider({ responses: [createTextResponse("CREATE TABLE employees (id int);")] });
    const translator = new LlmTranslator({ provider, model: "mock-model", logger, usage, maxTokens: 2048 });
    const controller = new AbortController();

    await translator.translate(REPAIR, controller.signal);

    const params = provider.chatMock.mock.calls[0]?.[0];
    expect(params.system).toBe(REPAIR_SYSTEM_PROMPT);
    expect(params.maxTokens).toBe(2048);
    expect(params.signal).toBe(controller.signal);
    expect(usage.countByPurpose("repair")).toBe(1);
  });

  it("warns when the output hit the token limit", async () => {
    const provider = createMockProvider({
      responses: [{ ...createTextResponse("CREATE TABLE employees ("), stopReason: "max_tokens" }],
    });
    const translator = new LlmTranslator({ provider, model: "mock-model", logger });

    await translator.translate(CONVERSION);

    expect(logger.warn).toHaveBeenCalledWith(
      { object: "EMPLOYEES", purpose: "conversion" },
      "Translator output hit the token limit"
    );
  });

  it("throws when the model returns no code", async () => {
    const provider = createMockProvider({ responses: [createTextResponse("```sql\n```")] });
    const translator = new LlmTranslator({ provider, model: "mock-model", logger });

    await expect(translator.translate(CONVERSION)).rejects.toThrow("Translator returned no code for EMPLOYEES");
  });
});
