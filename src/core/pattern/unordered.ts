// src/core/pattern/unordered.ts
// Unordered containers: injective assignment of pattern elements to
// distinct subject elements by constrained-first backtracking

import type { MatchFn, MatchResult } from "./types";
import type { TraceSink } from "../trace/trace";
import { NULL_TRACE } from "../trace/trace";
import { ok, fail, mergeBindings } from "./result";
import { SearchBudgetExceeded } from "./errors";

// ─────────────────────────────────────────────────────────────────
// Search budget
// ─────────────────────────────────────────────────────────────────

/**
 * SearchBudget: steps left for every unordered search of one match attempt.
 */
export type SearchBudget = {
  stepsLeft: number;
  readonly maxSteps: number;
};

export function makeSearchBudget(maxSteps: number = Number.POSITIVE_INFINITY): SearchBudget {
  return { stepsLeft: maxSteps, maxSteps };
}

// ─────────────────────────────────────────────────────────────────
// Compatibility table
// ─────────────────────────────────────────────────────────────────

/**
 * table[i][j] is the result of matching pattern i against subject j alone.
 */
export type CompatibilityTable = MatchResult[][];

export function buildCompatibilityTable<P, S>(
  patterns: readonly P[],
  subjects: readonly S[],
  matchOne: MatchFn<P, S>
): CompatibilityTable {
  return patterns.map((p) => subjects.map((s) => matchOne(p, s)));
}

/**
 * Row indices ordered by ascending number of compatible subjects
 * (most constrained first). Ties keep their original order.
 */
export function constraintOrder(table: CompatibilityTable): number[] {
  const counts = table.map((row) => row.filter((cell) => cell.ok).length);
  return table.map((_, i) => i).sort((a, b) => counts[a] - counts[b] || a - b);
}

// ─────────────────────────────────────────────────────────────────
// Backtracking search
// ─────────────────────────────────────────────────────────────────

export type SearchOutcome =
  | { ok: true; assignment: number[]; steps: number }
  | { ok: false; steps: number };

/**
 * Find one injective assignment of rows to columns such that every chosen
 * cell is compatible. Iterative: `p` is the row being placed, `cursor[p]`
 * the next column to try for it, `claimed` the columns held by rows < p.
 *
 * The first assignment in (row order, column order) is returned, so equal
 * inputs always yield the same assignment. Each loop iteration costs one
 * step of the budget.
 */
export function searchAssignment(
  compatible: readonly (readonly boolean[])[],
  subjectCount: number,
  budget: SearchBudget = makeSearchBudget(),
  trace: TraceSink = NULL_TRACE
): SearchOutcome {
  const m = compatible.length;
  const cursor = new Array<number>(m).fill(0);
  const claimed = new Set<number>();
  let p = 0;
  let steps = 0;

  for (;;) {
    if (budget.stepsLeft <= 0) throw new SearchBudgetExceeded(budget.maxSteps);
    budget.stepsLeft--;
    steps++;

    if (p === m) return { ok: true, assignment: cursor.slice(), steps };

    const s = cursor[p];
    if (s >= subjectCount) {
      if (p === 0) return { ok: false, steps };
      cursor[p] = 0;
      p--;
      claimed.delete(cursor[p]);
      cursor[p]++;
      trace.emit({ tag: "E_Backtrack", depth: p });
      continue;
    }

    if (claimed.has(s) || !compatible[p][s]) {
      cursor[p]++;
      continue;
    }

    claimed.add(s);
    p++;
  }
}

// ─────────────────────────────────────────────────────────────────
// Unordered matching
// ─────────────────────────────────────────────────────────────────

export type UnorderedContext = {
  budget: SearchBudget;
  trace: TraceSink;
};

/**
 * Match every pattern element to a distinct subject element. Caller
 * guarantees subjects.length >= patterns.length. Bindings of the chosen
 * cells are merged; the rest of the table is discarded.
 */
export function matchUnordered<P, S>(
  patterns: readonly P[],
  subjects: readonly S[],
  matchOne: MatchFn<P, S>,
  ctx: UnorderedContext
): MatchResult {
  const table = buildCompatibilityTable(patterns, subjects, matchOne);
  const order = constraintOrder(table);
  const rows = order.map((i) => table[i]);
  const compatible = rows.map((row) => row.map((cell) => cell.ok));

  const outcome = searchAssignment(compatible, subjects.length, ctx.budget, ctx.trace);
  ctx.trace.emit({
    tag: "E_UnorderedSearch",
    patterns: patterns.length,
    subjects: subjects.length,
    steps: outcome.steps,
    ok: outcome.ok,
  });

  if (!outcome.ok) {
    const stuck = compatible.findIndex((row) => !row.includes(true));
    return stuck >= 0
      ? fail(`element ${order[stuck]} matches no subject element`)
      : fail(`no assignment of ${patterns.length} elements to distinct subject elements`);
  }

  const chosen: MatchResult[] = outcome.assignment.map((s, p) => rows[p][s]);
  return ok(mergeBindings(...chosen.map((cell) => (cell.ok ? cell.bindings : new Map()))));
}
