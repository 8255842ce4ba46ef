// src/core/pattern/types.ts
// Pattern tree, subject shapes, bindings and match results

import type { Variable } from "./variable";

/** Concrete ordered-container kind ("array", "tuple", "Uint8Array", ...). */
export type SeqFamily = string;

/**
 * Type object usable in a type-check pattern: any class, including the
 * primitive wrappers (Number, String, BigInt, ...).
 */
export type Constructor =
  | (abstract new (...args: never[]) => unknown)
  | BigIntConstructor
  | SymbolConstructor;

export type LitPattern = { readonly tag: "Lit"; readonly value: unknown };
export type TypePattern = { readonly tag: "Type"; readonly ctor: Constructor };
export type AnyPattern = { readonly tag: "Any" };
export type VarPattern = { readonly tag: "Var"; readonly variable: Variable; readonly subpattern: Pattern };
export type SeqPattern = { readonly tag: "Seq"; readonly family: SeqFamily; readonly items: readonly Pattern[] };
export type SetPattern = { readonly tag: "Set"; readonly items: readonly Pattern[] };
export type MapPattern = { readonly tag: "Map"; readonly entries: readonly PatternEntry[] };

export type PatternEntry = readonly [key: Pattern, value: Pattern];

export type Pattern =
  | LitPattern
  | TypePattern
  | AnyPattern
  | VarPattern
  | SeqPattern
  | SetPattern
  | MapPattern;

export type PatternTag = Pattern["tag"];

/** Shape of a runtime value as the matcher sees it. */
export type Subject =
  | { readonly kind: "seq"; readonly family: SeqFamily; readonly items: readonly unknown[] }
  | { readonly kind: "set"; readonly items: readonly unknown[] }
  | { readonly kind: "map"; readonly entries: readonly (readonly [unknown, unknown])[] }
  | { readonly kind: "instance"; readonly value: object }
  | { readonly kind: "scalar"; readonly value: unknown };

export type SubjectKind = Subject["kind"];

/** Captured values keyed by variable id. */
export type Bindings = Map<number, unknown>;

export type MatchResult =
  | { readonly ok: true; readonly bindings: Bindings }
  | { readonly ok: false; readonly reason: string };

/** Matches one pattern element against one subject element. */
export type MatchFn<P, S> = (pattern: P, subject: S) => MatchResult;
