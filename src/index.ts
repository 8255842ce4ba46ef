// src/index.ts
// shapematch - Public API
//
// Structural pattern matching over ordinary JavaScript values.

// ═══════════════════════════════════════════════════════════════════════════════
// MATCHING
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/pattern";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// TRACING
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/trace";
