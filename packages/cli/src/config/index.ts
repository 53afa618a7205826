/**
 * Configuration module exports
 */

// Schema types
export type {
  AnalysisProfile,
  OutputFormat,
  AnalysisConfigSchema,
  EngineConfigSchema,
  BookConfigSchema,
  OutputConfigSchema,
  MovegradeConfig,
  PartialMovegradeConfig,
  CliOptions,
} from './schema.js';

// Defaults and profiles
export {
  ANALYSIS_PROFILES,
  DEFAULT_ANALYSIS_CONFIG,
  DEFAULT_ENGINE_SETTINGS,
  DEFAULT_OUTPUT_CONFIG,
  DEFAULT_CONFIG,
  applyProfile,
} from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  cliOptionsSchema,
  analysisProfileSchema,
  outputFormatSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
  validateCliOptions,
} from './validation.js';

// Loader
export { loadConfig, loadConfigFile, loadEnvConfig, formatConfig, type LoadConfigOptions } from './loader.js';
