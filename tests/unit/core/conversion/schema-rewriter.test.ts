import { describe, it, expect } from "vitest";
import { rewriteSchemaQualifiers } from "../../../../src/core/conversion/schema-rewriter.js";

describe("rewriteSchemaQualifiers", () => {
  const sources = ["APP", "HR", "SCOTT"];

  it("rewrites plain and quoted source qualifiers", () => {
    expect(
      rewriteSchemaQualifiers('SELECT * FROM HR.EMPLOYEES e JOIN "SCOTT".DEPT d ON e.x = d.y', sources, "public")
    ).toBe("SELECT * FROM public.EMPLOYEES e JOIN public.DEPT d ON e.x = d.y");
  });

  it("matches schema names case-insensitively", () => {
    expect(rewriteSchemaQualifiers("update hr.employees", sources, "migrated")).toBe("update migrated.employees");
  });

  it("leaves other schemas and column references alone", () => {
    const text = "SELECT e.salary FROM APP2.T e, pg_catalog.pg_class c";
    expect(rewriteSchemaQualifiers(text, sources, "public")).toBe(text);
  });

  it("does not rewrite the middle of a longer qualified name", () => {
    expect(rewriteSchemaQualifiers("x.HR.T", sources, "public")).toBe("x.HR.T");
  });

  it("is a no-op without source schemas", () => {
    expect(rewriteSchemaQualifiers("HR.EMPLOYEES", [], "public")).toBe("HR.EMPLOYEES");
  });
});
