import { describe, it, expect } from "vitest";
import {
  CLASSIFICATION_RULES,
  ErrorClassifier,
} from "../../../../src/core/repair/error-classifier.js";
import type { ErrorKind } from "../../../../src/core/types.js";

describe("ErrorClassifier", () => {
  const classifier = new ErrorClassifier();

  const cases: Array<[string, ErrorKind]> = [
    ["Cannot insert explicit value for identity column in table 'EMPLOYEES' when IDENTITY_INSERT is set to OFF.", "identity-column"],
    ["[428C9] cannot insert a non-DEFAULT value into column \"employee_id\"", "identity-column"],
    ["ORA-identity-001", "identity-column"],
    ["column \"employee_id\" is an identity column defined as GENERATED ALWAYS", "identity-column"],
    ["[42601] identity column type must be smallint, integer, or bigint", "identity-column"],
    ["Invalid object name 'HR.DEPARTMENTS'.", "missing-object"],
    ["[42P01] relation \"hr.departments\" does not exist", "missing-object"],
    ["[42883] function nvl(numeric, integer) does not exist", "missing-object"],
    ["Operand type clash: int is incompatible with date", "type-mismatch"],
    ["[42804] column \"hire_date\" is of type timestamp but expression is of type integer", "type-mismatch"],
    ["[22P02] invalid input syntax for type integer: \"abc\"", "type-mismatch"],
    ["[42501] permission denied for schema hr", "permission"],
    ["must be owner of table employees", "permission"],
    ["Incorrect syntax near 'END'.", "syntax"],
    ["[42601] syntax error at or near \"IS\"", "syntax"],
    ["[42601] syntax error at or near \"IDENTITY\"", "syntax"],
    ["syntax near X", "syntax"],
    ["Query timed out after 60000ms", "timeout"],
    ["[57014] canceling statement due to statement timeout", "timeout"],
    ["connection reset by peer", "unknown"],
    ["", "unknown"],
  ];

  it.each(cases)("classifies %j as %s", (message, expected) => {
    expect(classifier.classify(message)).toBe(expected);
  });

  it("is deterministic", () => {
    const message = "[42601] syntax error at or near \"PRAGMA\"";
    const first = classifier.classify(message);
    for (let i = 0; i < 20; i++) {
      expect(classifier.classify(message)).toBe(first);
    }
  });

  it("applies rules in order: the first match wins", () => {
    // Matches both the identity rule and the syntax rule; identity comes first.
    expect(classifier.classify("Incorrect syntax near IDENTITY_INSERT")).toBe("identity-column");
    // Matches both permission and timeout; permission comes first.
    expect(classifier.classify("permission denied while waiting, lock timeout")).toBe("permission");
  });

  it("accepts a custom rule table", () => {
    const custom = new ErrorClassifier([{ kind: "timeout", pattern: /deadlock/i }]);
    expect(custom.classify("deadlock detected")).toBe("timeout");
    expect(custom.classify("syntax error at or near")).toBe("unknown");
  });

  it("orders identity rules before syntax rules in the default table", () => {
    const kinds = CLASSIFICATION_RULES.map((r) => r.kind);
    expect(kinds.indexOf("identity-column")).toBeLessThan(kinds.indexOf("syntax"));
    expect(kinds.indexOf("missing-object")).toBeLessThan(kinds.indexOf("type-mismatch"));
  });
});
