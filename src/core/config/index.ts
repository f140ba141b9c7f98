// src/core/config/index.ts
// Configuration system exports

export {
  type DisplayConfig,
  type RuntimeConfig,
  type StartupConfig,
  type VariableSeed,
  type CalcConfig,
  type ConfigLayer,
  type ConfigValidation,
  DEFAULT_DISPLAY_CONFIG,
  DEFAULT_RUNTIME_CONFIG,
  DEFAULT_STARTUP_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  ANGLE_UNITS,
  CONSTANT_SYSTEMS,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  parseSimpleYaml,
  validateConfig,
} from "./config";
