/**
 * Default configuration values and profile presets
 */

import { DEFAULT_ENGINE_CONFIG } from '@movegrade/engine';

import type {
  AnalysisConfigSchema,
  AnalysisProfile,
  EngineConfigSchema,
  MovegradeConfig,
  OutputConfigSchema,
} from './schema.js';

/**
 * Analysis profile presets
 * Maps profile names to analysis configuration overrides
 */
export const ANALYSIS_PROFILES: Record<AnalysisProfile, Partial<AnalysisConfigSchema>> = {
  quick: { depth: 12 },
  standard: { depth: 18 },
  deep: { depth: 22 },
};

/**
 * Default analysis configuration (standard profile)
 */
export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfigSchema = {
  profile: 'standard',
  depth: 18,
  workers: 0,
  bookPlies: 10,
};

/**
 * Default engine configuration: one thread and a small hash per process,
 * since several processes run side by side
 */
export const DEFAULT_ENGINE_SETTINGS: EngineConfigSchema = {
  path: DEFAULT_ENGINE_CONFIG.path,
  threads: DEFAULT_ENGINE_CONFIG.threads,
  hashMb: DEFAULT_ENGINE_CONFIG.hashMb,
  timeoutMs: DEFAULT_ENGINE_CONFIG.timeoutMs,
};

/**
 * Default output configuration
 */
export const DEFAULT_OUTPUT_CONFIG: OutputConfigSchema = {
  format: 'json',
  reviewOnly: false,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: MovegradeConfig = {
  analysis: DEFAULT_ANALYSIS_CONFIG,
  engine: DEFAULT_ENGINE_SETTINGS,
  book: {},
  output: DEFAULT_OUTPUT_CONFIG,
};

/**
 * Apply profile presets to analysis configuration
 */
export function applyProfile(config: AnalysisConfigSchema, profile: AnalysisProfile): AnalysisConfigSchema {
  return {
    ...config,
    ...ANALYSIS_PROFILES[profile],
    profile,
  };
}
