// src/core/config/index.ts
// Configuration system exports

export {
  type SearchConfig,
  type GraphConfig,
  type MacroConfig,
  type TallyConfig,
  type PartialTallyConfig,
  type ConfigValidation,
  DEFAULT_SEARCH_CONFIG,
  DEFAULT_GRAPH_CONFIG,
  DEFAULT_MACRO_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
