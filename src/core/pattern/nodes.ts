// src/core/pattern/nodes.ts
// Pattern node constructors

import type {
  Pattern,
  PatternEntry,
  LitPattern,
  TypePattern,
  AnyPattern,
  VarPattern,
  SeqPattern,
  SetPattern,
  MapPattern,
  Constructor,
  SeqFamily,
} from "./types";
import type { Variable } from "./variable";

// Nodes built here are recognised by isPattern; a plain object that merely
// looks like a node is a mapping pattern to the compiler.
const built = new WeakSet<object>();

function register<T extends Pattern>(node: T): T {
  built.add(node);
  Object.freeze(node);
  return node;
}

export function isPattern(x: unknown): x is Pattern {
  return typeof x === "object" && x !== null && built.has(x);
}

export function lit(value: unknown): LitPattern {
  return register({ tag: "Lit", value });
}

export function typeOf(ctor: Constructor): TypePattern {
  return register({ tag: "Type", ctor });
}

const ANY_NODE: AnyPattern = register({ tag: "Any" });

export function anyPattern(): AnyPattern {
  return ANY_NODE;
}

export function varPattern(variable: Variable, subpattern: Pattern = ANY_NODE): VarPattern {
  return register({ tag: "Var", variable, subpattern });
}

export function seq(family: SeqFamily, items: readonly Pattern[]): SeqPattern {
  return register({ tag: "Seq", family, items: Object.freeze([...items]) });
}

export function setOf(items: readonly Pattern[]): SetPattern {
  return register({ tag: "Set", items: Object.freeze([...items]) });
}

export function mapOf(entries: readonly PatternEntry[]): MapPattern {
  return register({ tag: "Map", entries: Object.freeze([...entries]) });
}
