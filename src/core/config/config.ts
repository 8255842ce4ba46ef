// src/core/config/config.ts
// Configuration for match attempts: search limits and tracing

import * as fs from "fs";
import * as path from "path";
import type { TraceSink } from "../trace/trace";
import { NULL_TRACE, consoleTrace } from "../trace/trace";

// =========================================================================
// Configuration Types
// =========================================================================

export type SearchConfig = {
  /** Backtracking steps allowed per match attempt (Infinity = unbounded) */
  maxSteps: number;
};

export type TraceConfig = {
  /** Write trace events to the console */
  enabled: boolean;
  /** Line prefix for console trace output */
  prefix: string;
};

export type MatchConfig = {
  search: SearchConfig;
  trace: TraceConfig;
};

export type ConfigOverrides = {
  search?: Partial<SearchConfig>;
  trace?: Partial<TraceConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  maxSteps: Number.POSITIVE_INFINITY,
};

export const DEFAULT_TRACE_CONFIG: TraceConfig = {
  enabled: false,
  prefix: "[shapematch]",
};

export const DEFAULT_CONFIG: MatchConfig = {
  search: DEFAULT_SEARCH_CONFIG,
  trace: DEFAULT_TRACE_CONFIG,
};

export const DEFAULT_CONFIG_FILES = [
  "shapematch.config.json",
  "shapematch.config.yaml",
  "shapematch.config.yml",
];

// =========================================================================
// Configuration Loading
// =========================================================================

function parseFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === "") return undefined;
  return ["1", "true", "yes", "on"].includes(raw.toLowerCase());
}

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "SHAPEMATCH"): MatchConfig {
  const maxSteps = parseInt(process.env[`${prefix}_MAX_SEARCH_STEPS`] || "", 10) || DEFAULT_SEARCH_CONFIG.maxSteps;
  const enabled = parseFlag(process.env[`${prefix}_TRACE`]) ?? DEFAULT_TRACE_CONFIG.enabled;
  const tracePrefix = process.env[`${prefix}_TRACE_PREFIX`] || DEFAULT_TRACE_CONFIG.prefix;

  return {
    search: { maxSteps },
    trace: { enabled, prefix: tracePrefix },
  };
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function pick(data: Record<string, unknown>, camel: string, snake: string): unknown {
  return data[camel] ?? data[snake];
}

function numberOr(x: unknown, fallback: number): number {
  return typeof x === "number" && !Number.isNaN(x) ? x : fallback;
}

function booleanOr(x: unknown, fallback: boolean): boolean {
  return typeof x === "boolean" ? x : fallback;
}

function stringOr(x: unknown, fallback: string): string {
  return typeof x === "string" && x !== "" ? x : fallback;
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): MatchConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    // Simple YAML parser for basic configs
    data = parseSimpleYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) {
    throw new Error(`Config file must contain an object: ${filePath}`);
  }
  return configFromObject(data);
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON/YAML).
 */
export function configFromObject(data: Record<string, unknown>): MatchConfig {
  const searchData: Record<string, unknown> = isRecord(data.search) ? data.search : {};
  const traceData: Record<string, unknown> = isRecord(data.trace) ? data.trace : {};

  return {
    search: {
      maxSteps: numberOr(pick(searchData, "maxSteps", "max_steps"), DEFAULT_SEARCH_CONFIG.maxSteps),
    },
    trace: {
      enabled: booleanOr(traceData.enabled, DEFAULT_TRACE_CONFIG.enabled),
      prefix: stringOr(traceData.prefix, DEFAULT_TRACE_CONFIG.prefix),
    },
  };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: ConfigOverrides[]): MatchConfig {
  const result: MatchConfig = {
    search: { ...DEFAULT_CONFIG.search },
    trace: { ...DEFAULT_CONFIG.trace },
  };

  for (const cfg of configs) {
    if (cfg.search) {
      result.search = { ...result.search, ...cfg.search };
    }
    if (cfg.trace) {
      result.trace = { ...result.trace, ...cfg.trace };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: ConfigOverrides;
  cwd?: string;
}): MatchConfig {
  let config = configFromEnv();

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(cwd, name);
      if (fs.existsSync(p)) {
        config = mergeConfigs(config, configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

/**
 * Trace sink selected by the configuration.
 */
export function traceSinkFromConfig(config: MatchConfig): TraceSink {
  return config.trace.enabled ? consoleTrace(config.trace.prefix) : NULL_TRACE;
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);

    // Pop to the parent at a shallower indent
    while (stack.length > 1 && stack[stack.length - 1].indent >= indent) {
      stack.pop();
    }

    const parent = stack[stack.length - 1].obj;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else if (value === "true") {
      parent[key] = true;
    } else if (value === "false") {
      parent[key] = false;
    } else if (value === "null") {
      parent[key] = null;
    } else if (/^-?\d+$/.test(value)) {
      parent[key] = parseInt(value, 10);
    } else if (/^-?\d+\.\d+$/.test(value)) {
      parent[key] = parseFloat(value);
    } else if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      parent[key] = value.slice(1, -1);
    } else {
      parent[key] = value;
    }
  }

  return result;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: MatchConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (Number.isNaN(config.search.maxSteps) || config.search.maxSteps < 1) {
    errors.push("search.maxSteps must be at least 1");
  } else if (config.search.maxSteps < 100) {
    warnings.push("search.maxSteps is very low, small set patterns may exhaust it");
  }

  if (config.trace.enabled && config.trace.prefix.trim() === "") {
    warnings.push("trace.prefix is empty");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
