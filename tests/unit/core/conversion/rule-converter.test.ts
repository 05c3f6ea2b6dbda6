import { describe, it, expect } from "vitest";
import {
  RuleBasedConverter,
  applyRewriteRules,
} from "../../../../src/core/conversion/rule-converter.js";
import { SAMPLE_PROCEDURE } from "../../../helpers/fixtures.js";

describe("applyRewriteRules", () => {
  it("maps column types", () => {
    expect(applyRewriteRules("NAME VARCHAR2(25 BYTE), SALARY NUMBER(8,2), ID NUMBER(6), N NUMBER")).toBe(
      "NAME VARCHAR(25), SALARY NUMERIC(8,2), ID NUMERIC(6), N NUMERIC"
    );
    expect(applyRewriteRules("BODY CLOB, PIC BLOB, HASH RAW(16), COUNTER PLS_INTEGER")).toBe(
      "BODY TEXT, PIC BYTEA, HASH BYTEA, COUNTER INTEGER"
    );
  });

  it("maps DATE columns but not column names containing DATE", () => {
    expect(applyRewriteRules("HIRE_DATE DATE DEFAULT SYSDATE")).toBe(
      "HIRE_DATE TIMESTAMP(0) DEFAULT CURRENT_TIMESTAMP"
    );
  });

  it("rewrites built-in functions and sequences", () => {
    expect(applyRewriteRules("SELECT NVL(a, 0), emp_seq.NEXTVAL FROM DUAL")).toBe(
      "SELECT COALESCE(a, 0), nextval('emp_seq')"
    );
  });

  it("turns RAISE_APPLICATION_ERROR into RAISE EXCEPTION", () => {
    expect(applyRewriteRules("RAISE_APPLICATION_ERROR(-20001, 'No such employee');")).toBe(
      "RAISE EXCEPTION 'No such employee';"
    );
  });

  it("normalizes CREATE statements", () => {
    expect(applyRewriteRules("CREATE TABLE T (ID NUMBER)")).toBe("CREATE TABLE IF NOT EXISTS T (ID NUMERIC)");
    expect(applyRewriteRules("CREATE OR REPLACE EDITIONABLE TRIGGER T_TRG")).toBe("CREATE OR REPLACE TRIGGER T_TRG");
    expect(applyRewriteRules("CREATE FUNCTION F")).toBe("CREATE OR REPLACE FUNCTION F");
  });

  it("drops identity ON NULL", () => {
    expect(applyRewriteRules("ID NUMBER GENERATED BY DEFAULT ON NULL AS IDENTITY")).toBe(
      "ID NUMERIC GENERATED BY DEFAULT AS IDENTITY"
    );
  });
});

describe("RuleBasedConverter", () => {
  const converter = new RuleBasedConverter();

  it("converts a clean procedure without diagnostics", async () => {
    const result = await converter.convert(SAMPLE_PROCEDURE, "Procedure");
    expect(result.errorCount).toBe(0);
    expect(result.warningCount).toBe(0);
    expect(result.text).toBe(
      [
        "CREATE OR REPLACE PROCEDURE HR.RAISE_SALARY (p_id IN NUMERIC) AS",
        "BEGIN",
        "  UPDATE HR.EMPLOYEES SET SALARY = COALESCE(SALARY, 0) * 1.1 WHERE EMPLOYEE_ID = p_id;",
        "END;",
      ].join("\n")
    );
  });

  it("warns once per unsupported construct with its line", async () => {
    const source = "CREATE FUNCTION F RETURN NUMBER AS\nBEGIN\n  SELECT DECODE(a, 1, 'x') INTO v FROM t WHERE ROWNUM < 5;\nEND;";
    const result = await converter.convert(source, "Function");
    expect(result.errorCount).toBe(0);
    expect(result.diagnostics).toEqual([
      "WARNING: line 3: DECODE needs a CASE expression",
      "WARNING: line 3: ROWNUM needs LIMIT or row_number()",
    ]);
  });

  it("does not mistake %ROWTYPE for %TYPE", async () => {
    const result = await converter.convert("v_emp employees%ROWTYPE;", "Procedure");
    expect(result.diagnostics).toEqual(["WARNING: line 1: %ROWTYPE attribute needs manual mapping"]);
  });

  it("reports PRAGMA EXCEPTION_INIT as an error in triggers only", async () => {
    const source = "DECLARE\n  e EXCEPTION;\n  PRAGMA EXCEPTION_INIT(e, -20001);\nBEGIN NULL; END;";
    const trigger = await converter.convert(source, "Trigger");
    expect(trigger.errorCount).toBe(1);
    expect(trigger.diagnostics).toEqual(["ERROR: line 3: PRAGMA EXCEPTION_INIT cannot be expressed in a trigger"]);

    const procedure = await converter.convert(source, "Procedure");
    expect(procedure.errorCount).toBe(0);
  });

  it("reports object types as errors", async () => {
    const result = await converter.convert("CREATE OR REPLACE TYPE address_t AS OBJECT (street VARCHAR2(40));", "Table");
    expect(result.errorCount).toBe(1);
  });

  it("does not flag DBMS_OUTPUT.PUT_LINE as a package reference", async () => {
    const result = await converter.convert("BEGIN DBMS_OUTPUT.PUT_LINE('hi'); DBMS_LOCK.SLEEP(1); END;", "Procedure");
    expect(result.diagnostics).toEqual(["WARNING: line 1: reference to a built-in package"]);
    expect(result.text).toBe("BEGIN RAISE NOTICE '%', 'hi'; DBMS_LOCK.SLEEP(1); END;");
  });
});
