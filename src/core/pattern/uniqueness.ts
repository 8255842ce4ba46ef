// src/core/pattern/uniqueness.ts
// Static check: each variable occurs at most once per pattern tree

import type { Pattern } from "./types";
import type { Variable } from "./variable";
import { RepeatedVariableError } from "./errors";

export type Occurrence = { variable: Variable; count: number };

/**
 * Count variable occurrences by id, descending into capture constraints
 * and container elements (keys and values of mapping patterns alike).
 */
export function collectVariables(
  pattern: Pattern,
  counts: Map<number, Occurrence> = new Map()
): Map<number, Occurrence> {
  switch (pattern.tag) {
    case "Var": {
      const seen = counts.get(pattern.variable.id);
      if (seen) seen.count++;
      else counts.set(pattern.variable.id, { variable: pattern.variable, count: 1 });
      collectVariables(pattern.subpattern, counts);
      break;
    }
    case "Seq":
    case "Set":
      for (const item of pattern.items) collectVariables(item, counts);
      break;
    case "Map":
      for (const [k, v] of pattern.entries) {
        collectVariables(k, counts);
        collectVariables(v, counts);
      }
      break;
    case "Lit":
    case "Type":
    case "Any":
      break;
  }
  return counts;
}

export function findRepeatedVariables(pattern: Pattern): Occurrence[] {
  return [...collectVariables(pattern).values()].filter((o) => o.count > 1);
}

/**
 * Throw RepeatedVariableError for the first variable used more than once.
 * Returns the pattern's variables in first-occurrence order.
 */
export function assertUniqueVariables(pattern: Pattern): Variable[] {
  const occurrences = [...collectVariables(pattern).values()];
  for (const o of occurrences) {
    if (o.count > 1) throw new RepeatedVariableError(o.variable, o.count);
  }
  return occurrences.map((o) => o.variable);
}
