// src/core/pattern/compile.ts
// Native values -> pattern trees, and pattern printing

import type { Pattern, Constructor } from "./types";
import { ANY } from "./symbols";
import { Variable } from "./variable";
import { orderedView } from "./sequence";
import { isPlainObject } from "./subject";
import { isPattern, lit, typeOf, anyPattern, varPattern, seq, setOf, mapOf } from "./nodes";

/**
 * Functions with a prototype can appear on the right of `instanceof`;
 * arrow functions and methods cannot.
 */
export function isConstructor(x: unknown): x is Constructor {
  return typeof x === "function" && typeof x.prototype === "object" && x.prototype !== null;
}

/**
 * Build a pattern from an ordinary value:
 *
 *   ANY                     -> wildcard
 *   Variable                -> capture (with the variable's constraint)
 *   class / constructor     -> type check
 *   array, typed array,
 *   Sequence                -> ordered pattern of the value's family
 *   Set                     -> unordered pattern
 *   Map, plain object       -> mapping pattern (keys are patterns too)
 *   anything else           -> literal
 *
 * Nodes built with the constructors in ./nodes pass through unchanged, so
 * both styles can be mixed freely.
 */
export function toPattern(source: unknown): Pattern {
  if (isPattern(source)) return source;
  if (source === ANY) return anyPattern();
  if (source instanceof Variable) return varPattern(source, source.subpattern);
  if (isConstructor(source)) return typeOf(source);

  const ordered = orderedView(source);
  if (ordered) return seq(ordered.family, ordered.items.map(toPattern));

  if (source instanceof Set) return setOf([...source].map(toPattern));
  if (source instanceof Map) {
    return mapOf([...source.entries()].map(([k, v]) => [toPattern(k), toPattern(v)] as const));
  }
  if (isPlainObject(source)) {
    return mapOf(Object.entries(source).map(([k, v]) => [lit(k), toPattern(v)] as const));
  }

  return lit(source);
}

function literalToString(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return `${value}n`;
  if (typeof value === "symbol") return value.toString();
  if (value instanceof Date) return `Date(${value.toISOString()})`;
  if (typeof value === "object" && value !== null) return value.constructor?.name ?? "object";
  return String(value);
}

export function patternToString(p: Pattern): string {
  switch (p.tag) {
    case "Lit": return literalToString(p.value);
    case "Type": return `<${p.ctor.name}>`;
    case "Any": return "_";
    case "Var":
      return p.subpattern.tag === "Any"
        ? p.variable.toString()
        : `${p.variable.toString()}:${patternToString(p.subpattern)}`;
    case "Seq": return `${p.family}[${p.items.map(patternToString).join(", ")}]`;
    case "Set": return `{${p.items.map(patternToString).join(", ")}}`;
    case "Map":
      return `{${p.entries.map(([k, v]) => `${patternToString(k)}: ${patternToString(v)}`).join(", ")}}`;
  }
}
