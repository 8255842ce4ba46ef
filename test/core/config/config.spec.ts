// test/core/config/config.spec.ts
// Tests for configuration system

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  validateConfig,
  loadConfig,
  traceSinkFromConfig,
  DEFAULT_CONFIG,
} from "../../../src/core/config/config";
import { NULL_TRACE } from "../../../src/core/trace/trace";

describe("configFromEnv", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    // Create a fresh copy
    process.env = { ...originalEnv };
    delete process.env.SHAPEMATCH_MAX_SEARCH_STEPS;
    delete process.env.SHAPEMATCH_TRACE;
    delete process.env.SHAPEMATCH_TRACE_PREFIX;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("returns defaults when no env vars set", () => {
    const config = configFromEnv();
    expect(config.search.maxSteps).toBe(Number.POSITIVE_INFINITY);
    expect(config.trace).toEqual(DEFAULT_CONFIG.trace);
  });

  it("reads the search step limit", () => {
    process.env.SHAPEMATCH_MAX_SEARCH_STEPS = "5000";
    expect(configFromEnv().search.maxSteps).toBe(5000);
  });

  it("ignores an unparsable step limit", () => {
    process.env.SHAPEMATCH_MAX_SEARCH_STEPS = "lots";
    expect(configFromEnv().search.maxSteps).toBe(Number.POSITIVE_INFINITY);
  });

  it("reads trace settings", () => {
    process.env.SHAPEMATCH_TRACE = "TRUE";
    process.env.SHAPEMATCH_TRACE_PREFIX = "[m]";
    expect(configFromEnv().trace).toEqual({ enabled: true, prefix: "[m]" });

    process.env.SHAPEMATCH_TRACE = "0";
    expect(configFromEnv().trace.enabled).toBe(false);
  });

  it("supports a custom prefix", () => {
    process.env.APP_MAX_SEARCH_STEPS = "12";
    expect(configFromEnv("APP").search.maxSteps).toBe(12);
  });
});

describe("configFromObject", () => {
  it("parses basic config object", () => {
    const config = configFromObject({
      search: { maxSteps: 300 },
      trace: { enabled: true, prefix: "#" },
    });

    expect(config.search.maxSteps).toBe(300);
    expect(config.trace.enabled).toBe(true);
    expect(config.trace.prefix).toBe("#");
  });

  it("handles snake_case keys", () => {
    const config = configFromObject({ search: { max_steps: 700 } });
    expect(config.search.maxSteps).toBe(700);
  });

  it("uses defaults for missing or mistyped fields", () => {
    const config = configFromObject({ search: { maxSteps: "many" }, trace: "on" });
    expect(config).toEqual(DEFAULT_CONFIG);
  });
});

describe("configFromFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "shapematch-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads JSON", () => {
    const file = path.join(dir, "shapematch.config.json");
    fs.writeFileSync(file, JSON.stringify({ search: { maxSteps: 50 } }));
    expect(configFromFile(file).search.maxSteps).toBe(50);
  });

  it("reads simple YAML", () => {
    const file = path.join(dir, "shapematch.config.yaml");
    fs.writeFileSync(file, "# limits\nsearch:\n  max_steps: 80\ntrace:\n  enabled: true\n  prefix: \"[y]\"\n");
    const config = configFromFile(file);
    expect(config.search.maxSteps).toBe(80);
    expect(config.trace).toEqual({ enabled: true, prefix: "[y]" });
  });

  it("rejects missing files and unknown formats", () => {
    expect(() => configFromFile(path.join(dir, "absent.json"))).toThrow("Config file not found");
    const file = path.join(dir, "config.toml");
    fs.writeFileSync(file, "");
    expect(() => configFromFile(file)).toThrow("Unsupported config file format: .toml");
  });

  it("rejects files that do not hold an object", () => {
    const file = path.join(dir, "list.json");
    fs.writeFileSync(file, "[1, 2]");
    expect(() => configFromFile(file)).toThrow("Config file must contain an object");
  });

  it("is found by loadConfig in the working directory", () => {
    fs.writeFileSync(path.join(dir, "shapematch.config.json"), JSON.stringify({ search: { maxSteps: 90 } }));
    const config = loadConfig({ cwd: dir, overrides: { trace: { prefix: ">" } } });
    expect(config.search.maxSteps).toBe(90);
    expect(config.trace.prefix).toBe(">");
  });
});

describe("mergeConfigs", () => {
  it("merges search config", () => {
    const merged = mergeConfigs({ search: { maxSteps: 10 } }, { trace: { enabled: true } });
    expect(merged.search.maxSteps).toBe(10);
    expect(merged.trace.enabled).toBe(true);
    expect(merged.trace.prefix).toBe(DEFAULT_CONFIG.trace.prefix);
  });

  it("later configs override earlier ones", () => {
    const merged = mergeConfigs(
      { search: { maxSteps: 1 } },
      { search: { maxSteps: 2 } },
      { search: { maxSteps: 3 } }
    );
    expect(merged.search.maxSteps).toBe(3);
  });

  it("does not mutate the defaults", () => {
    mergeConfigs({ search: { maxSteps: 4 } });
    expect(DEFAULT_CONFIG.search.maxSteps).toBe(Number.POSITIVE_INFINITY);
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    const result = validateConfig(DEFAULT_CONFIG);
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
    expect(result.warnings).toHaveLength(0);
  });

  it("errors on a non-positive step limit", () => {
    const result = validateConfig(mergeConfigs({ search: { maxSteps: 0 } }));
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["search.maxSteps must be at least 1"]);
  });

  it("warns on a very low step limit", () => {
    const result = validateConfig(mergeConfigs({ search: { maxSteps: 50 } }));
    expect(result.valid).toBe(true);
    expect(result.warnings.some((w) => w.includes("very low"))).toBe(true);
  });
});

describe("traceSinkFromConfig", () => {
  it("is silent unless tracing is enabled", () => {
    expect(traceSinkFromConfig(DEFAULT_CONFIG)).toBe(NULL_TRACE);
    expect(traceSinkFromConfig(mergeConfigs({ trace: { enabled: true } }))).not.toBe(NULL_TRACE);
  });
});
