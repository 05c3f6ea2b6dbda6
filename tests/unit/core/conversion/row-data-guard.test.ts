import { describe, it, expect } from "vitest";
import {
  assertNoRowData,
  findRowData,
  redactRowValues,
  stripRowData,
} from "../../../../src/core/conversion/row-data-guard.js";
import { RowDataBoundaryError } from "../../../../src/core/errors.js";
import type { TranslationRequest } from "../../../../src/core/collaborators.js";

function tableRequest(overrides: Partial<TranslationRequest> = {}): TranslationRequest {
  return {
    objectName: "EMPLOYEES",
    kind: "Table",
    sourceText: "CREATE TABLE EMPLOYEES (ID NUMBER);",
    patterns: [],
    ...overrides,
  };
}

describe("findRowData", () => {
  it("detects INSERT ... VALUES tuples", () => {
    expect(findRowData("INSERT INTO t (a) VALUES (1);")).toBe("INSERT ... VALUES");
  });

  it("detects INSERT ALL", () => {
    expect(findRowData("INSERT ALL INTO t VALUES (1) SELECT * FROM dual;")).toBe("INSERT ALL");
  });

  it("detects COPY data blocks", () => {
    expect(findRowData("COPY hr.employees (id) FROM stdin;")).toBe("COPY ... FROM stdin");
  });

  it("accepts INSERT ... SELECT and plain DDL", () => {
    expect(findRowData("INSERT INTO t SELECT * FROM s;")).toBeNull();
    expect(findRowData("CREATE TABLE t (values_count INTEGER);")).toBeNull();
  });
});

describe("assertNoRowData", () => {
  it("passes clean table payloads", () => {
    expect(() => assertNoRowData(tableRequest())).not.toThrow();
  });

  it("rejects row data in the table source text", () => {
    expect(() =>
      assertNoRowData(tableRequest({ sourceText: "INSERT INTO EMPLOYEES (ID) VALUES (1);" }))
    ).toThrow("Translator payload for EMPLOYEES carries row-level data (INSERT ... VALUES in source text)");
  });

  it("rejects row data in known solutions", () => {
    const request = tableRequest({
      repair: {
        currentText: "CREATE TABLE EMPLOYEES (ID INTEGER);",
        rawError: "syntax error",
        errorKind: "syntax",
        memoryHits: [
          { signature: "s", solution: "COPY employees FROM stdin;", provenance: "translator", recordedAt: "t" },
        ],
        searchHits: [],
        previousErrors: [],
        identityColumns: [],
      },
    });
    expect(() => assertNoRowData(request)).toThrow(RowDataBoundaryError);
  });

  it("rejects row values echoed in the repair error text", () => {
    const request = tableRequest({
      repair: {
        currentText: "CREATE TABLE EMPLOYEES (ID INTEGER);",
        rawError: "[23505] could not create unique index DETAIL: Key (id)=(7) is duplicated.",
        errorKind: "unknown",
        memoryHits: [],
        searchHits: [],
        previousErrors: [],
        identityColumns: [],
      },
    });
    expect(() => assertNoRowData(request)).toThrow(
      "Translator payload for EMPLOYEES carries row-level data (key values in error text)"
    );
  });

  it("rejects row values in earlier errors and accepts redacted ones", () => {
    const repair = {
      currentText: "CREATE TABLE EMPLOYEES (ID INTEGER);",
      rawError: "[23502] null value DETAIL: Failing row contains (<row>).",
      errorKind: "unknown" as const,
      memoryHits: [],
      searchHits: [],
      identityColumns: [],
    };
    expect(() => assertNoRowData(tableRequest({ repair: { ...repair, previousErrors: [] } }))).not.toThrow();
    expect(() =>
      assertNoRowData(
        tableRequest({ repair: { ...repair, previousErrors: ["DETAIL: Failing row contains (7, Jane)."] } })
      )
    ).toThrow("Translator payload for EMPLOYEES carries row-level data (failing row in earlier error)");
  });

  it("only applies to tables", () => {
    expect(() =>
      assertNoRowData({
        objectName: "LOAD_DEFAULTS",
        kind: "Procedure",
        sourceText: "BEGIN INSERT INTO settings (k, v) VALUES ('a', 'b'); END;",
        patterns: [],
      })
    ).not.toThrow();
  });
});

describe("redactRowValues", () => {
  it("replaces key and failing-row tuples, including nested parentheses", () => {
    expect(
      redactRowValues("Key (email, dept)=(a@b.example, (10)) is duplicated. Failing row contains (1, null).")
    ).toBe("Key (email, dept)=(<row>) is duplicated. Failing row contains (<row>).");
  });

  it("leaves other text alone", () => {
    const message = '[42601] syntax error at or near "KEY"';
    expect(redactRowValues(message)).toBe(message);
  });
});

describe("stripRowData", () => {
  it("keeps DDL and drops inserts and COPY blocks", () => {
    const exported = [
      "CREATE TABLE T (ID NUMBER);",
      "INSERT INTO T (ID) VALUES (1);",
      "INSERT INTO T (ID) VALUES (2);",
      "COPY t (id) FROM stdin;",
      "1",
      "2",
      "\\.",
      "CREATE INDEX T_IX ON T (ID);",
    ].join("\n");

    expect(stripRowData(exported)).toBe("CREATE TABLE T (ID NUMBER);\nCREATE INDEX T_IX ON T (ID);");
  });

  it("returns DDL-only text unchanged", () => {
    const ddl = "CREATE TABLE T (\n  ID NUMBER\n);";
    expect(stripRowData(ddl)).toBe(ddl);
  });
});
