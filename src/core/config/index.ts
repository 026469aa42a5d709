// src/core/config/index.ts
// Configuration module exports

export {
  type HostConfig,
  type LispnimConfig,
  type ConfigLayer,
  type ConfigValidation,
  DEFAULT_CONFIG,
  DEFAULT_HOST_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromObject,
  configFromFile,
  mergeConfigs,
  loadConfig,
  parseSimpleYaml,
  validateConfig,
} from "./config";
