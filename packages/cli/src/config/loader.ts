/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';

import { ConfigError } from '../errors/cli-errors.js';

import { ANALYSIS_PROFILES, DEFAULT_CONFIG } from './defaults.js';
import type { CliOptions, MovegradeConfig, PartialMovegradeConfig } from './schema.js';
import { validateConfig, validatePartialConfig } from './validation.js';

type ValueKind = 'string' | 'integer' | 'boolean';

interface EnvBinding {
  path: readonly [section: string, key: string];
  kind: ValueKind;
}

/**
 * Environment variable mapping
 * Earlier names win when several map to the same setting
 */
const ENV_VAR_MAP: ReadonlyArray<[string, EnvBinding]> = [
  // Analysis
  ['MOVEGRADE_PROFILE', { path: ['analysis', 'profile'], kind: 'string' }],
  ['MOVEGRADE_DEPTH', { path: ['analysis', 'depth'], kind: 'integer' }],
  ['MOVEGRADE_WORKERS', { path: ['analysis', 'workers'], kind: 'integer' }],
  ['MOVEGRADE_BOOK_PLIES', { path: ['analysis', 'bookPlies'], kind: 'integer' }],

  // Engine
  ['MOVEGRADE_ENGINE_PATH', { path: ['engine', 'path'], kind: 'string' }],
  ['STOCKFISH_PATH', { path: ['engine', 'path'], kind: 'string' }],
  ['MOVEGRADE_ENGINE_THREADS', { path: ['engine', 'threads'], kind: 'integer' }],
  ['MOVEGRADE_ENGINE_HASH', { path: ['engine', 'hashMb'], kind: 'integer' }],
  ['MOVEGRADE_ENGINE_TIMEOUT', { path: ['engine', 'timeoutMs'], kind: 'integer' }],

  // Book
  ['MOVEGRADE_BOOK_PATH', { path: ['book', 'path'], kind: 'string' }],
  ['BOOK_PATH', { path: ['book', 'path'], kind: 'string' }],

  // Output
  ['MOVEGRADE_FORMAT', { path: ['output', 'format'], kind: 'string' }],
  ['MOVEGRADE_REVIEW_ONLY', { path: ['output', 'reviewOnly'], kind: 'boolean' }],
];

/**
 * Options for loading configuration
 */
export interface LoadConfigOptions {
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory the config file search starts from (default: process.cwd()) */
  cwd?: string;
}

/**
 * Merge one source over another, section by section
 */
function mergeConfig(target: MovegradeConfig, source: PartialMovegradeConfig): MovegradeConfig {
  return {
    analysis: { ...target.analysis, ...stripUndefined(source.analysis) },
    engine: { ...target.engine, ...stripUndefined(source.engine) },
    book: { ...target.book, ...stripUndefined(source.book) },
    output: { ...target.output, ...stripUndefined(source.output) },
  };
}

function stripUndefined<T extends object>(section: T | undefined): Partial<T> {
  if (!section) return {};
  const result: Partial<T> = {};
  for (const key of Object.keys(section)) {
    if (isKeyOf(section, key) && section[key] !== undefined) {
      result[key] = section[key];
    }
  }
  return result;
}

function isKeyOf<T extends object>(obj: T, key: PropertyKey): key is keyof T {
  return key in obj;
}

/**
 * Parse an environment variable value based on its expected type.
 * Values that do not parse are passed through for validation to reject.
 */
function parseEnvValue(value: string, kind: ValueKind): unknown {
  switch (kind) {
    case 'boolean':
      return value.toLowerCase() === 'true' || value === '1';
    case 'integer': {
      const num = Number(value.trim());
      return Number.isNaN(num) ? value : num;
    }
    case 'string':
      return value;
  }
}

/**
 * Load configuration from environment variables
 * @throws ConfigValidationError if a variable holds an invalid value
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialMovegradeConfig {
  const raw: Record<string, Record<string, unknown>> = {};

  for (const [envVar, binding] of ENV_VAR_MAP) {
    const value = env[envVar];
    if (value === undefined || value === '') continue;

    const [section, key] = binding.path;
    const target = (raw[section] ??= {});
    if (key in target) continue;
    target[key] = parseEnvValue(value, binding.kind);
  }

  return validatePartialConfig(raw, 'environment');
}

/**
 * Load configuration from config file using cosmiconfig
 *
 * @param configPath - Explicit file; failing to read it is an error
 * @returns null when no file is given and none is found
 */
export async function loadConfigFile(configPath?: string, cwd?: string): Promise<PartialMovegradeConfig | null> {
  const explorer = cosmiconfig('movegrade', {
    searchPlaces: [
      'package.json',
      '.movegraderc',
      '.movegraderc.json',
      '.movegraderc.yaml',
      '.movegraderc.yml',
      'movegrade.config.js',
      'movegrade.config.cjs',
    ],
  });

  let result: CosmiconfigResult;
  try {
    result = configPath ? await explorer.load(configPath) : await explorer.search(cwd);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      configPath ? `Cannot read config file ${configPath}: ${reason}` : `Cannot read config file: ${reason}`,
      'Check that the file exists and is valid JSON or YAML',
    );
  }

  if (!result || result.isEmpty) {
    return null;
  }
  return validatePartialConfig(result.config, result.filepath);
}

/**
 * Map CLI options to config object
 */
function mapCliToConfig(options: CliOptions): PartialMovegradeConfig {
  return {
    analysis: { profile: options.profile, depth: options.depth, workers: options.workers },
    engine: { path: options.engine },
    book: { path: options.book },
    output: { format: options.format, reviewOnly: options.reviewOnly },
  };
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 *
 * A profile sets the search depth unless some source gives a depth explicitly.
 *
 * @throws ConfigValidationError if the merged configuration is invalid
 * @throws ConfigError if an explicit config file cannot be read
 */
export async function loadConfig(cliOptions: CliOptions, options: LoadConfigOptions = {}): Promise<MovegradeConfig> {
  const fileConfig = await loadConfigFile(cliOptions.config, options.cwd);
  const envConfig = loadEnvConfig(options.env);
  const cliConfig = mapCliToConfig(cliOptions);

  let config = DEFAULT_CONFIG;
  for (const layer of [fileConfig, envConfig, cliConfig]) {
    if (layer) config = mergeConfig(config, layer);
  }

  const explicitDepth = cliConfig.analysis?.depth ?? envConfig.analysis?.depth ?? fileConfig?.analysis?.depth;
  if (explicitDepth === undefined) {
    const presetDepth = ANALYSIS_PROFILES[config.analysis.profile].depth;
    if (presetDepth !== undefined) {
      config = { ...config, analysis: { ...config.analysis, depth: presetDepth } };
    }
  }

  return validateConfig(config);
}

/**
 * Format configuration for display
 */
export function formatConfig(config: MovegradeConfig): string {
  return JSON.stringify(config, null, 2);
}

export { ANALYSIS_PROFILES };
