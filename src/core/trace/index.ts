// src/core/trace/index.ts
// Trace exports

export {
  type TraceEvent,
  type TraceTag,
  type TraceSink,
  type MemoryTrace,
  NULL_TRACE,
  formatTraceEvent,
  memoryTrace,
  consoleTrace,
} from "./trace";
