// src/core/pattern/symbols.ts
// Marker values: the wildcard and the unbound-variable sentinel

/** Wildcard marker. Anywhere a pattern is expected, ANY matches every subject. */
export const ANY: unique symbol = Symbol("ANY");
export type Any = typeof ANY;

/** Value reported by a variable that holds no binding. */
export const UNMATCHED: unique symbol = Symbol("UNMATCHED");
export type Unmatched = typeof UNMATCHED;

export function isUnmatched(x: unknown): x is Unmatched {
  return x === UNMATCHED;
}
