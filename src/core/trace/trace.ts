// src/core/trace/trace.ts
// Structured trace events for match attempts

/**
 * Trace event types. Emitted in order during a single match attempt.
 */
export type TraceEvent =
  | { tag: "E_MatchStart"; pattern: string; variables: number }
  | { tag: "E_UsageError"; error: string }
  | { tag: "E_UnorderedSearch"; patterns: number; subjects: number; steps: number; ok: boolean }
  | { tag: "E_Backtrack"; depth: number }
  | { tag: "E_MatchEnd"; ok: boolean; reason?: string };

export type TraceTag = TraceEvent["tag"];

/**
 * Trace sink for logging events.
 */
export interface TraceSink {
  emit(event: TraceEvent): void;
}

export const NULL_TRACE: TraceSink = {
  emit(): void {},
};

export function formatTraceEvent(event: TraceEvent): string {
  switch (event.tag) {
    case "E_MatchStart":
      return `match start ${event.pattern} (${event.variables} variables)`;
    case "E_UsageError":
      return `usage error: ${event.error}`;
    case "E_UnorderedSearch":
      return `unordered ${event.patterns}x${event.subjects}: ${event.ok ? "assigned" : "exhausted"} after ${event.steps} steps`;
    case "E_Backtrack":
      return `backtrack to ${event.depth}`;
    case "E_MatchEnd":
      return event.ok ? "match ok" : `no match: ${event.reason ?? "unknown"}`;
  }
}

export type MemoryTrace = TraceSink & {
  readonly events: readonly TraceEvent[];
  recent(limit?: number): TraceEvent[];
  ofTag<T extends TraceTag>(tag: T): Extract<TraceEvent, { tag: T }>[];
  clear(): void;
};

/**
 * In-memory event log. Keeps at most `capacity` events, dropping the oldest.
 */
export function memoryTrace(capacity: number = 10_000): MemoryTrace {
  const log: TraceEvent[] = [];
  return {
    get events(): readonly TraceEvent[] {
      return log;
    },
    emit(event: TraceEvent): void {
      log.push(event);
      if (log.length > capacity) log.splice(0, log.length - capacity);
    },
    recent(limit: number = 100): TraceEvent[] {
      return log.slice(-limit);
    },
    ofTag<T extends TraceTag>(tag: T): Extract<TraceEvent, { tag: T }>[] {
      const out: Extract<TraceEvent, { tag: T }>[] = [];
      for (const e of log) if (isTag(e, tag)) out.push(e);
      return out;
    },
    clear(): void {
      log.length = 0;
    },
  };
}

function isTag<T extends TraceTag>(e: TraceEvent, tag: T): e is Extract<TraceEvent, { tag: T }> {
  return e.tag === tag;
}

/**
 * Write every event as one line through console.debug.
 */
export function consoleTrace(prefix: string = "[shapematch]"): TraceSink {
  return {
    emit(event: TraceEvent): void {
      console.debug(`${prefix} ${formatTraceEvent(event)}`);
    },
  };
}
