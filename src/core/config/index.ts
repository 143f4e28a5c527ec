// src/core/config/index.ts
// Configuration system exports

export {
  type RegistryConfig,
  type DisplayConfig,
  type TagDispatchConfig,
  type PartialConfig,
  type ConfigValidation,
  DEFAULT_REGISTRY_CONFIG,
  DEFAULT_DISPLAY_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  partialConfigFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
