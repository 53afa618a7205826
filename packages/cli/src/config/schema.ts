/**
 * Configuration schema types for the movegrade CLI
 */

/**
 * Analysis profile presets
 */
export type AnalysisProfile = 'quick' | 'standard' | 'deep';

/**
 * Output format
 */
export type OutputFormat = 'json' | 'text';

/**
 * Analysis configuration
 */
export interface AnalysisConfigSchema {
  /** Analysis profile preset */
  profile: AnalysisProfile;
  /** Engine search depth for every position */
  depth: number;
  /** Parallel engine processes (0 = available parallelism) */
  workers: number;
  /** Plies from the start of a game that may be book moves */
  bookPlies: number;
}

/**
 * Engine process configuration
 */
export interface EngineConfigSchema {
  /** Engine binary, looked up on PATH when not absolute */
  path: string;
  /** UCI Threads option per process */
  threads: number;
  /** UCI Hash option per process (MB) */
  hashMb: number;
  /** Search timeout per position (ms) */
  timeoutMs: number;
}

/**
 * Opening book configuration
 */
export interface BookConfigSchema {
  /** Path to the book database; no book is used when unset */
  path?: string;
}

/**
 * Output configuration
 */
export interface OutputConfigSchema {
  format: OutputFormat;
  /** Only print moves worth a second look */
  reviewOnly: boolean;
}

/**
 * Complete movegrade configuration
 */
export interface MovegradeConfig {
  analysis: AnalysisConfigSchema;
  engine: EngineConfigSchema;
  book: BookConfigSchema;
  output: OutputConfigSchema;
}

/**
 * Configuration as read from a single source (file, environment, flags)
 */
export interface PartialMovegradeConfig {
  analysis?: Partial<AnalysisConfigSchema>;
  engine?: Partial<EngineConfigSchema>;
  book?: Partial<BookConfigSchema>;
  output?: Partial<OutputConfigSchema>;
}

/**
 * CLI options for the analyze command
 */
export interface CliOptions {
  /** Input PGN file path */
  input?: string;
  /** Output file path */
  output?: string;
  /** Config file path */
  config?: string;
  profile?: AnalysisProfile;
  depth?: number;
  workers?: number;
  /** Engine binary */
  engine?: string;
  /** Book database */
  book?: string;
  format?: OutputFormat;
  reviewOnly?: boolean;
  /** Print resolved configuration and exit */
  showConfig?: boolean;
  /** Validate setup without analyzing */
  dryRun?: boolean;
  /** Disable colored output */
  noColor?: boolean;
}
