// src/core/pattern/dispatch.ts
// Recursive dispatch over pattern kinds

import type { Constructor, MatchResult, Pattern, PatternEntry } from "./types";
import type { TraceSink } from "../trace/trace";
import { NULL_TRACE } from "../trace/trace";
import { classifySubject, describeSubject } from "./subject";
import { valueEquals } from "./equality";
import { matchOrdered } from "./ordered";
import { matchUnordered, makeSearchBudget, type SearchBudget } from "./unordered";
import { patternToString } from "./compile";
import { ok, fail, mergeBindings } from "./result";

export type MatchContext = {
  budget: SearchBudget;
  trace: TraceSink;
};

export function makeMatchContext(opts?: Partial<MatchContext>): MatchContext {
  return {
    budget: opts?.budget ?? makeSearchBudget(),
    trace: opts?.trace ?? NULL_TRACE,
  };
}

// Primitive wrappers: `5 instanceof Number` is false, so test typeof instead.
const PRIMITIVE_TYPES = new Map<Constructor, string>([
  [Number, "number"],
  [String, "string"],
  [Boolean, "boolean"],
  [BigInt, "bigint"],
  [Symbol, "symbol"],
]);

export function isInstance(subject: unknown, ctor: Constructor): boolean {
  const primitive = PRIMITIVE_TYPES.get(ctor);
  if (primitive !== undefined && typeof subject === primitive) return true;
  return subject instanceof ctor;
}

/**
 * Match `pattern` against `subject`. Checks go by pattern kind: container
 * patterns first, then type, capture, wildcard and finally literal
 * equality. Every mismatch is a plain `{ ok: false }` with a reason.
 */
export function matchPattern(
  pattern: Pattern,
  subject: unknown,
  ctx: MatchContext = makeMatchContext()
): MatchResult {
  const recur = (p: Pattern, s: unknown): MatchResult => matchPattern(p, s, ctx);

  switch (pattern.tag) {
    case "Set": {
      const s = classifySubject(subject);
      if (s.kind !== "set") return fail(`expected set, got ${describeSubject(s)}`);
      if (s.items.length < pattern.items.length) {
        return fail(`set of ${s.items.length} is smaller than pattern of ${pattern.items.length}`);
      }
      return matchUnordered(pattern.items, s.items, recur, ctx);
    }

    case "Map": {
      const s = classifySubject(subject);
      if (s.kind !== "map") return fail(`expected mapping, got ${describeSubject(s)}`);
      if (s.entries.length < pattern.entries.length) {
        return fail(`mapping of ${s.entries.length} is smaller than pattern of ${pattern.entries.length}`);
      }
      const matchEntry = ([kp, vp]: PatternEntry, [ks, vs]: readonly [unknown, unknown]): MatchResult => {
        const k = recur(kp, ks);
        if (!k.ok) return fail(`key: ${k.reason}`);
        const v = recur(vp, vs);
        if (!v.ok) return fail(`value: ${v.reason}`);
        return ok(mergeBindings(k.bindings, v.bindings));
      };
      return matchUnordered(pattern.entries, s.entries, matchEntry, ctx);
    }

    case "Seq": {
      const s = classifySubject(subject);
      if (s.kind !== "seq") return fail(`expected ${pattern.family}, got ${describeSubject(s)}`);
      if (s.family !== pattern.family) return fail(`expected ${pattern.family}, got ${s.family}`);
      if (s.items.length !== pattern.items.length) {
        return fail(`expected ${pattern.items.length} elements, got ${s.items.length}`);
      }
      return matchOrdered(pattern.items, s.items, recur);
    }

    case "Type":
      return isInstance(subject, pattern.ctor)
        ? ok()
        : fail(`expected instance of ${pattern.ctor.name}`);

    case "Var": {
      const r = recur(pattern.subpattern, subject);
      if (!r.ok) return fail(`${pattern.variable.toString()}: ${r.reason}`);
      r.bindings.set(pattern.variable.id, subject);
      return r;
    }

    case "Any":
      return ok();

    case "Lit":
      return valueEquals(pattern.value, subject)
        ? ok()
        : fail(`expected ${patternToString(pattern)}`);
  }
}
