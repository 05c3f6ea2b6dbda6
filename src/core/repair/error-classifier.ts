/**
 * Deployment error taxonomy and classification.
 * One ordered rule table replaces scattered substring checks: the first rule
 * that matches wins, so the order below is part of the classifier's contract.
 */
import type { ErrorKind } from "../types.js";

export interface ClassificationRule {
  kind: ErrorKind;
  pattern: RegExp;
}

export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  // Identity columns
  { kind: "identity-column", pattern: /identity_insert/i },
  { kind: "identity-column", pattern: /explicit value for (?:the )?identity column/i },
  { kind: "identity-column", pattern: /non-default value into column .* identity/i },
  { kind: "identity-column", pattern: /\[428C9\]/ },
  { kind: "identity-column", pattern: /identity column|generated (?:always|by default) as identity/i },
  { kind: "identity-column", pattern: /ORA-identity-\d+/i },

  // Missing referenced objects
  { kind: "missing-object", pattern: /invalid object name/i },
  { kind: "missing-object", pattern: /could not find (?:stored procedure|object)/i },
  { kind: "missing-object", pattern: /(?:relation|table|function|procedure|schema|type) .* does not exist/i },
  { kind: "missing-object", pattern: /\[42P01\]|\[42883\]|\[3F000\]|\[42704\]/ },
  { kind: "missing-object", pattern: /ORA-00942|ORA-04043/i },

  // Type mismatches
  { kind: "type-mismatch", pattern: /operand type clash/i },
  { kind: "type-mismatch", pattern: /conversion failed when converting/i },
  { kind: "type-mismatch", pattern: /cannot be cast automatically|is of type .* but expression is of type/i },
  { kind: "type-mismatch", pattern: /\[42804\]|\[22P02\]|\[42846\]/ },
  { kind: "type-mismatch", pattern: /type mismatch|invalid input syntax for type|datatype/i },

  // Permissions
  { kind: "permission", pattern: /permission denied|permission was denied/i },
  { kind: "permission", pattern: /must be owner of/i },
  { kind: "permission", pattern: /\[42501\]/ },
  { kind: "permission", pattern: /insufficient privileges|ORA-01031/i },

  // Syntax
  { kind: "syntax", pattern: /incorrect syntax near/i },
  { kind: "syntax", pattern: /syntax error at or near/i },
  { kind: "syntax", pattern: /\[42601\]/ },
  { kind: "syntax", pattern: /\bsyntax\b/i },
  { kind: "syntax", pattern: /must be the only statement in the batch/i },

  // Timeouts
  { kind: "timeout", pattern: /timed out|timeout expired|\btimeout\b/i },
  { kind: "timeout", pattern: /canceling statement due to statement timeout|\[57014\]/i },
];

export class ErrorClassifier {
  constructor(private readonly rules: readonly ClassificationRule[] = CLASSIFICATION_RULES) {}

  classify(rawErrorText: string): ErrorKind {
    for (const rule of this.rules) {
      if (rule.pattern.test(rawErrorText)) {
        return rule.kind;
      }
    }
    return "unknown";
  }
}
