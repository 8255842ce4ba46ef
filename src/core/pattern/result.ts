// src/core/pattern/result.ts
// MatchResult helpers

import type { Bindings, MatchResult } from "./types";

export function ok(bindings: Bindings = new Map()): MatchResult {
  return { ok: true, bindings };
}

export function fail(reason: string): MatchResult {
  return { ok: false, reason };
}

/**
 * Copy every binding of `from` into `into`.
 * Keys never collide: a variable occurs at most once per pattern.
 */
export function mergeInto(into: Bindings, from: Bindings): Bindings {
  for (const [id, value] of from) into.set(id, value);
  return into;
}

export function mergeBindings(...all: Bindings[]): Bindings {
  const out: Bindings = new Map();
  for (const b of all) mergeInto(out, b);
  return out;
}
