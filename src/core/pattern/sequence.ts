// src/core/pattern/sequence.ts
// Family-tagged ordered containers

import type { SeqFamily } from "./types";

/** Family of plain JavaScript arrays. */
export const ARRAY_FAMILY: SeqFamily = "array";
export const TUPLE_FAMILY: SeqFamily = "tuple";

/**
 * An ordered container carrying an explicit family tag. Sequence patterns
 * only match subjects of the same family, so `tuple(1, 2)` and `[1, 2]`
 * never match each other.
 */
export class Sequence<T = unknown> implements Iterable<T> {
  readonly items: readonly T[];

  constructor(
    public readonly family: SeqFamily,
    items: Iterable<T>
  ) {
    this.items = Object.freeze([...items]);
  }

  get length(): number {
    return this.items.length;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }

  toString(): string {
    return `${this.family}(${this.items.map(String).join(", ")})`;
  }
}

export function sequenceOf<T>(family: SeqFamily, items: Iterable<T>): Sequence<T> {
  return new Sequence(family, items);
}

export function tuple<T extends unknown[]>(...items: T): Sequence<T[number]> {
  return new Sequence(TUPLE_FAMILY, items);
}

type TypedArray =
  | Int8Array | Uint8Array | Uint8ClampedArray
  | Int16Array | Uint16Array
  | Int32Array | Uint32Array
  | Float32Array | Float64Array
  | BigInt64Array | BigUint64Array;

export function isTypedArray(x: unknown): x is TypedArray {
  return ArrayBuffer.isView(x) && !(x instanceof DataView);
}

/**
 * Family and elements of an ordered value, or undefined when the value is
 * not an ordered container.
 */
export function orderedView(x: unknown): { family: SeqFamily; items: readonly unknown[] } | undefined {
  if (Array.isArray(x)) {
    // Array subclasses form their own family
    const family = Object.getPrototypeOf(x) === Array.prototype ? ARRAY_FAMILY : x.constructor.name;
    return { family, items: x };
  }
  if (x instanceof Sequence) return { family: x.family, items: x.items };
  if (isTypedArray(x)) return { family: x.constructor.name, items: Array.from<unknown>(x) };
  return undefined;
}
