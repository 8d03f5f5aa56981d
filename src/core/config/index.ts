// src/core/config/index.ts
// Configuration system exports

export {
  type FormHeadsConfig,
  type TraceConfig,
  type FormsConfig,
  type PartialFormsConfig,
  type ConfigValidation,
  DEFAULT_FORM_HEADS,
  DEFAULT_TRACE_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
