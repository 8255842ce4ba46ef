// src/core/pattern/index.ts
// Structural pattern matching

export { ANY, UNMATCHED, type Any, type Unmatched, isUnmatched } from "./symbols";

export {
  type Pattern,
  type PatternTag,
  type PatternEntry,
  type LitPattern,
  type TypePattern,
  type AnyPattern,
  type VarPattern,
  type SeqPattern,
  type SetPattern,
  type MapPattern,
  type Constructor,
  type SeqFamily,
  type Subject,
  type SubjectKind,
  type Bindings,
  type MatchResult,
  type MatchFn,
} from "./types";

export { Variable } from "./variable";
export { Sequence, sequenceOf, tuple, ARRAY_FAMILY, TUPLE_FAMILY } from "./sequence";
export { classifySubject, isPlainObject } from "./subject";
export { valueEquals } from "./equality";
export { isPattern, lit, typeOf, anyPattern, varPattern, seq, setOf, mapOf } from "./nodes";
export { toPattern, patternToString, isConstructor } from "./compile";
export { type MatchContext, matchPattern, makeMatchContext, isInstance } from "./dispatch";
export { matchOrdered } from "./ordered";
export {
  type SearchBudget,
  type SearchOutcome,
  type CompatibilityTable,
  makeSearchBudget,
  buildCompatibilityTable,
  constraintOrder,
  searchAssignment,
  matchUnordered,
} from "./unordered";
export { type Occurrence, collectVariables, findRepeatedVariables, assertUniqueVariables } from "./uniqueness";
export { RepeatedVariableError, SearchBudgetExceeded } from "./errors";
export { type MatcherOptions, Matcher, matchOnce } from "./matcher";
