// src/core/pattern/equality.ts
// Value equality for literal patterns

import { classifySubject } from "./subject";
import { searchAssignment } from "./unordered";

// Each item of `xs` must pair with its own item of `ys`; deeply equal
// objects can sit side by side in a Set, so membership alone is not enough.
function pairsOneToOne<T>(xs: readonly T[], ys: readonly T[], eq: (x: T, y: T) => boolean): boolean {
  if (xs.length !== ys.length) return false;
  const table = xs.map((x) => ys.map((y) => eq(x, y)));
  return searchAssignment(table, ys.length).ok;
}

/**
 * Structural equality without coercion. Primitives compare with ===, so NaN
 * is unequal to itself; containers compare by shape and contents; Dates by
 * timestamp; any other object by identity.
 */
export function valueEquals(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a !== "object" || a === null || typeof b !== "object" || b === null) return false;
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();

  const sa = classifySubject(a);
  const sb = classifySubject(b);

  if (sa.kind === "seq" && sb.kind === "seq") {
    if (sa.family !== sb.family || sa.items.length !== sb.items.length) return false;
    return sa.items.every((x, i) => valueEquals(x, sb.items[i]));
  }

  if (sa.kind === "set" && sb.kind === "set") {
    return pairsOneToOne(sa.items, sb.items, valueEquals);
  }

  if (sa.kind === "map" && sb.kind === "map") {
    return pairsOneToOne(sa.entries, sb.entries, ([ka, va], [kb, vb]) => valueEquals(ka, kb) && valueEquals(va, vb));
  }

  return false;
}
