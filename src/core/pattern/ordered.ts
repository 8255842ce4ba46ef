// src/core/pattern/ordered.ts
// Element-wise matching of equal-length sequences

import type { Bindings, MatchFn, MatchResult, Pattern } from "./types";
import { ok, fail, mergeInto } from "./result";

/**
 * Match patterns[i] against items[i] in order. The first mismatch aborts
 * and its bindings so far are dropped. Caller guarantees equal lengths.
 */
export function matchOrdered(
  patterns: readonly Pattern[],
  items: readonly unknown[],
  matchOne: MatchFn<Pattern, unknown>
): MatchResult {
  const bindings: Bindings = new Map();
  for (let i = 0; i < patterns.length; i++) {
    const r = matchOne(patterns[i], items[i]);
    if (!r.ok) return fail(`element ${i}: ${r.reason}`);
    mergeInto(bindings, r.bindings);
  }
  return ok(bindings);
}
