import type { LLMResponse } from "../../src/core/llm/provider.js";
import { createMigrationObject } from "../../src/core/lifecycle.js";
import type { MigrationObject, ObjectKind } from "../../src/core/types.js";

export const FIXED_NOW = new Date("2025-03-14T09:26:53.000Z");

export function fixedClock(): () => Date {
  return () => FIXED_NOW;
}

export function createTextResponse(
  text: string,
  provider: string = "mock"
): LLMResponse {
  return {
    text,
    stopReason: "end_turn",
    usage: { inputTokens: 100, outputTokens: 50 },
    model: "mock-model",
    provider,
  };
}

export function createNullUsageResponse(
  text: string,
  provider: string = "local"
): LLMResponse {
  return {
    text,
    stopReason: "end_turn",
    usage: { inputTokens: null, outputTokens: null },
    model: "llama3.1:8b",
    provider,
  };
}

export function createObject(
  name: string,
  kind: ObjectKind = "Table",
  schema: string = "HR"
): MigrationObject {
  return createMigrationObject({ identity: { name, schema }, kind });
}

/** Object already through fetch, convert and review, ready for the repair loop. */
export function createReviewedObject(
  name: string,
  kind: ObjectKind = "Table",
  sourceText: string = SAMPLE_TABLE_DDL
): MigrationObject {
  const object = createObject(name, kind);
  object.sourceText = sourceText;
  object.status = "Reviewed";
  return object;
}

export const SAMPLE_TABLE_DDL = `CREATE TABLE HR.EMPLOYEES (
  EMPLOYEE_ID NUMBER(6) GENERATED BY DEFAULT ON NULL AS IDENTITY,
  LAST_NAME VARCHAR2(25) NOT NULL
);`;

export const SAMPLE_PROCEDURE = `CREATE PROCEDURE HR.RAISE_SALARY (p_id IN NUMBER) AS
BEGIN
  UPDATE HR.EMPLOYEES SET SALARY = NVL(SALARY, 0) * 1.1 WHERE EMPLOYEE_ID = p_id;
END;
/`;
