// test/core/pattern/compile.spec.ts
// Tests for building patterns from plain values and printing them

import { describe, it, expect } from "vitest";
import { toPattern, patternToString, isConstructor } from "../../../src/core/pattern/compile";
import { isPattern, lit, seq } from "../../../src/core/pattern/nodes";
import { Variable } from "../../../src/core/pattern/variable";
import { tuple, sequenceOf } from "../../../src/core/pattern/sequence";
import { ANY } from "../../../src/core/pattern/symbols";

describe("toPattern", () => {
  it("maps markers, variables and types", () => {
    const x = new Variable("x");
    expect(toPattern(ANY).tag).toBe("Any");
    expect(toPattern(x)).toMatchObject({ tag: "Var", variable: x });
    expect(toPattern(Number)).toMatchObject({ tag: "Type", ctor: Number });
  });

  it("treats arrow functions as literals", () => {
    const f = () => 1;
    expect(isConstructor(f)).toBe(false);
    expect(toPattern(f)).toMatchObject({ tag: "Lit", value: f });
  });

  it("keeps the family of ordered values", () => {
    expect(toPattern([1])).toMatchObject({ tag: "Seq", family: "array" });
    expect(toPattern(tuple(1))).toMatchObject({ tag: "Seq", family: "tuple" });
    expect(toPattern(sequenceOf("row", [1]))).toMatchObject({ tag: "Seq", family: "row" });
    expect(toPattern(new Float64Array(1))).toMatchObject({ tag: "Seq", family: "Float64Array" });
  });

  it("compiles plain-object keys as literals", () => {
    const p = toPattern({ a: 1 });
    expect(p.tag).toBe("Map");
    if (p.tag === "Map") {
      expect(p.entries).toHaveLength(1);
      expect(p.entries[0][0]).toMatchObject({ tag: "Lit", value: "a" });
    }
  });

  it("passes built nodes through", () => {
    const node = seq("tuple", [lit(1)]);
    expect(toPattern(node)).toBe(node);
    expect(toPattern([node])).toMatchObject({ tag: "Seq", items: [node] });
  });

  it("does not mistake look-alike objects for nodes", () => {
    const fake = { tag: "Lit", value: 1 };
    expect(isPattern(fake)).toBe(false);
    expect(toPattern(fake).tag).toBe("Map");
  });

  it("carries a variable's constraint", () => {
    const x = new Variable("x");
    x.of(String);
    expect(toPattern(x)).toMatchObject({ tag: "Var", subpattern: { tag: "Type", ctor: String } });
  });
});

describe("patternToString", () => {
  it("renders nested patterns", () => {
    const x = new Variable("x");
    expect(patternToString(toPattern([1, "a", x, new Set([ANY])]))).toBe('array[1, "a", ?x, {_}]');
  });

  it("renders constraints and mappings", () => {
    const n = new Variable("n");
    expect(patternToString(toPattern(tuple(n.of(Number), 2n)))).toBe("tuple[?n:<Number>, 2n]");
    expect(patternToString(toPattern({ k: null }))).toBe('{"k": null}');
  });
});
