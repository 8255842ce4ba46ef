// src/core/config/index.ts
// Configuration system exports

export {
  type SearchConfig,
  type TraceConfig,
  type MatchConfig,
  type ConfigOverrides,
  type ConfigValidation,
  DEFAULT_SEARCH_CONFIG,
  DEFAULT_TRACE_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  traceSinkFromConfig,
  validateConfig,
} from "./config";
