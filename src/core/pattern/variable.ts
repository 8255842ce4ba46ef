// src/core/pattern/variable.ts
// Capture cells

import type { Pattern, VarPattern } from "./types";
import { UNMATCHED } from "./symbols";
import { anyPattern, varPattern } from "./nodes";
import { toPattern } from "./compile";
import { collectVariables } from "./uniqueness";
import { RepeatedVariableError } from "./errors";

let nextVariableId = 0;

/**
 * A capture site. Each instance gets its own id at creation; bindings are
 * keyed by that id, never by structure, so two variables are never
 * interchangeable.
 */
export class Variable {
  readonly id: number;
  readonly name: string;
  private pattern: Pattern = anyPattern();
  private bound = false;
  private current: unknown = UNMATCHED;

  constructor(name?: string) {
    this.id = nextVariableId++;
    this.name = name ?? `v${this.id}`;
  }

  /** Constraint the captured value must satisfy (wildcard by default). */
  get subpattern(): Pattern {
    return this.pattern;
  }

  /** Bound value, or UNMATCHED. */
  get value(): unknown {
    return this.bound ? this.current : UNMATCHED;
  }

  get isBound(): boolean {
    return this.bound;
  }

  /**
   * Constrain this variable and return its capture node, e.g.
   * `[1, x.of(Number), 3]`. The constraint is fixed here, at construction
   * time; a later `of` replaces it for patterns built afterwards.
   */
  of(subpattern: unknown): VarPattern {
    const compiled = toPattern(subpattern);
    const self = collectVariables(compiled).get(this.id);
    if (self) throw new RepeatedVariableError(this, self.count + 1);
    this.pattern = compiled;
    return varPattern(this, compiled);
  }

  /** Drop the binding. The constraint is kept. */
  reset(): void {
    this.bound = false;
    this.current = UNMATCHED;
  }

  bind(value: unknown): void {
    this.bound = true;
    this.current = value;
  }

  toString(): string {
    return `?${this.name}`;
  }
}
