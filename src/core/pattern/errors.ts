// src/core/pattern/errors.ts
// Usage errors raised by the matcher

import type { Variable } from "./variable";

/**
 * A pattern used the same Variable instance at more than one site.
 * Raised before any structural comparison, whatever the subject.
 */
export class RepeatedVariableError extends Error {
  constructor(
    public readonly variable: Variable,
    public readonly occurrences: number
  ) {
    super(`RepeatedVariableError: variable ${variable.toString()} occurs ${occurrences} times in pattern`);
    this.name = "RepeatedVariableError";
  }
}

/**
 * The unordered search ran past the configured step limit.
 */
export class SearchBudgetExceeded extends Error {
  constructor(public readonly limit: number) {
    super(`SearchBudgetExceeded: search step limit (${limit}) exceeded`);
    this.name = "SearchBudgetExceeded";
  }
}
