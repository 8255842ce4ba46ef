// src/core/pattern/matcher.ts
// Stateful façade: owns capture variables and runs match attempts

import type { Bindings, MatchResult } from "./types";
import type { TraceSink } from "../trace/trace";
import type { MatchConfig } from "../config/config";
import { DEFAULT_CONFIG, traceSinkFromConfig } from "../config/config";
import { Variable } from "./variable";
import { toPattern, patternToString } from "./compile";
import { assertUniqueVariables } from "./uniqueness";
import { matchPattern, makeMatchContext } from "./dispatch";
import { makeSearchBudget } from "./unordered";

export type MatcherOptions = {
  /** Search limits and tracing (defaults to DEFAULT_CONFIG) */
  config?: MatchConfig;
  /** Trace sink; overrides the one derived from config */
  trace?: TraceSink;
  /** Names for the owned variables, in declaration order */
  names?: readonly string[];
};

/**
 * Holds a fixed number of variables and reuses them across match
 * attempts:
 *
 *   const [m, [x, y]] = new Matcher(2).unpack();
 *   if (m.match([x, 2, y.of(String)], [1, 2, "three"])) {
 *     x.value; // 1
 *     y.value; // "three"
 *   }
 *
 * Not reentrant: one attempt at a time per Matcher (and per Variable).
 */
export class Matcher implements Iterable<Matcher | readonly Variable[]> {
  readonly variables: readonly Variable[];
  private readonly config: MatchConfig;
  private readonly trace: TraceSink;
  private last: MatchResult | undefined;

  constructor(arity: number = 0, options: MatcherOptions = {}) {
    if (!Number.isInteger(arity) || arity < 0) {
      throw new RangeError(`Matcher arity must be a non-negative integer, got ${arity}`);
    }
    const names = options.names ?? [];
    this.variables = Object.freeze(Array.from({ length: arity }, (_, i) => new Variable(names[i])));
    this.config = options.config ?? DEFAULT_CONFIG;
    this.trace = options.trace ?? traceSinkFromConfig(this.config);
  }

  /** Result of the last attempt. */
  get matched(): boolean {
    return this.last?.ok ?? false;
  }

  /** Last attempt's full result, including the mismatch reason. */
  get result(): MatchResult | undefined {
    return this.last;
  }

  /**
   * Reset owned variables, reject patterns with a repeated variable, then
   * match. Bindings are published only when the whole pattern matches.
   * @throws RepeatedVariableError before any comparison is made
   * @throws SearchBudgetExceeded when config.search.maxSteps runs out
   */
  match(pattern: unknown, subject: unknown): boolean {
    for (const v of this.variables) v.reset();
    this.last = undefined;

    const compiled = toPattern(pattern);
    let participants: Variable[];
    try {
      participants = assertUniqueVariables(compiled);
    } catch (error) {
      this.trace.emit({ tag: "E_UsageError", error: error instanceof Error ? error.message : String(error) });
      throw error;
    }

    this.trace.emit({ tag: "E_MatchStart", pattern: patternToString(compiled), variables: participants.length });
    const ctx = makeMatchContext({
      budget: makeSearchBudget(this.config.search.maxSteps),
      trace: this.trace,
    });
    const r = matchPattern(compiled, subject, ctx);
    this.last = r;
    this.trace.emit(r.ok ? { tag: "E_MatchEnd", ok: true } : { tag: "E_MatchEnd", ok: false, reason: r.reason });

    if (r.ok) publish(participants, r.bindings);
    return r.ok;
  }

  /** Current values of the owned variables, in declaration order. */
  *values(): IterableIterator<unknown> {
    for (const v of this.variables) yield v.value;
  }

  unpack(): [Matcher, readonly Variable[]] {
    return [this, this.variables];
  }

  /** Yields the matcher, then its variables: `const [m, vars] = matcher`. */
  *[Symbol.iterator](): Iterator<Matcher | readonly Variable[]> {
    yield this;
    yield this.variables;
  }
}

function publish(variables: readonly Variable[], bindings: Bindings): void {
  for (const v of variables) {
    if (bindings.has(v.id)) v.bind(bindings.get(v.id));
  }
}

/**
 * One-shot match without a Matcher. Bindings stay keyed by variable id and
 * nothing is written to the variables.
 * @throws RepeatedVariableError
 */
export function matchOnce(
  pattern: unknown,
  subject: unknown,
  options: Omit<MatcherOptions, "names"> = {}
): MatchResult {
  const compiled = toPattern(pattern);
  assertUniqueVariables(compiled);
  const config = options.config ?? DEFAULT_CONFIG;
  return matchPattern(compiled, subject, makeMatchContext({
    budget: makeSearchBudget(config.search.maxSteps),
    trace: options.trace ?? traceSinkFromConfig(config),
  }));
}
