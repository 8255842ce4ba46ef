// src/core/pattern/subject.ts
// Shape inspection of runtime values

import type { Subject } from "./types";
import { orderedView } from "./sequence";

export function isPlainObject(x: unknown): x is Record<string, unknown> {
  if (typeof x !== "object" || x === null) return false;
  const proto: unknown = Object.getPrototypeOf(x);
  return proto === Object.prototype || proto === null;
}

/**
 * Classify a value into one of the shapes the dispatcher understands.
 * Strings are scalars, not sequences.
 */
export function classifySubject(value: unknown): Subject {
  const ordered = orderedView(value);
  if (ordered) return { kind: "seq", family: ordered.family, items: ordered.items };
  if (value instanceof Set) return { kind: "set", items: [...value] };
  if (value instanceof Map) return { kind: "map", entries: [...value.entries()] };
  if (isPlainObject(value)) return { kind: "map", entries: Object.entries(value) };
  if (typeof value === "object" && value !== null) return { kind: "instance", value };
  return { kind: "scalar", value };
}

export function describeSubject(s: Subject): string {
  switch (s.kind) {
    case "seq": return `${s.family} of ${s.items.length}`;
    case "set": return `set of ${s.items.length}`;
    case "map": return `mapping of ${s.entries.length}`;
    case "instance": return s.value.constructor?.name ?? "object";
    case "scalar": return s.value === null ? "null" : typeof s.value;
  }
}
