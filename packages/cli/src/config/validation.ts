/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

import type { CliOptions, MovegradeConfig, PartialMovegradeConfig } from './schema.js';

/**
 * Engine depth schema (1-99)
 */
const depthSchema = z.number().int().min(1).max(99);

/**
 * Analysis profile schema
 */
export const analysisProfileSchema = z.enum(['quick', 'standard', 'deep']);

/**
 * Output format schema
 */
export const outputFormatSchema = z.enum(['json', 'text']);

const analysisConfigSchema = z.object({
  profile: analysisProfileSchema,
  depth: depthSchema,
  workers: z.number().int().min(0),
  bookPlies: z.number().int().min(0).max(40),
});

const engineConfigSchema = z.object({
  path: z.string().min(1),
  threads: z.number().int().min(1),
  hashMb: z.number().int().min(1),
  timeoutMs: z.number().int().min(1000),
});

const bookConfigSchema = z.object({
  path: z.string().min(1).optional(),
});

const outputConfigSchema = z.object({
  format: outputFormatSchema,
  reviewOnly: z.boolean(),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  analysis: analysisConfigSchema,
  engine: engineConfigSchema,
  book: bookConfigSchema,
  output: outputConfigSchema,
});

/**
 * Partial configuration schema (for config files and the environment)
 */
export const partialConfigSchema = z
  .object({
    analysis: analysisConfigSchema.partial().optional(),
    engine: engineConfigSchema.partial().optional(),
    book: bookConfigSchema.partial().optional(),
    output: outputConfigSchema.partial().optional(),
  })
  .strict();

/**
 * Options of the analyze command as Commander hands them over
 */
export const cliOptionsSchema = z.object({
  input: z.string().optional(),
  output: z.string().optional(),
  config: z.string().optional(),
  profile: analysisProfileSchema.optional(),
  depth: depthSchema.optional(),
  workers: z.number().int().min(0).optional(),
  engine: z.string().min(1).optional(),
  book: z.string().min(1).optional(),
  format: outputFormatSchema.optional(),
  reviewOnly: z.boolean().optional(),
  showConfig: z.boolean().optional(),
  dryRun: z.boolean().optional(),
  // Commander stores --no-color as `color: false`
  color: z.boolean().optional(),
});

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError, prefix?: string): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => {
      const path = issue.path.join('.');
      return { path: prefix ? `${prefix}${path ? `.${path}` : ''}` : path, message: issue.message };
    }),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): MovegradeConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration from one source
 *
 * @param source - Prefix for error paths, e.g. the config file name
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown, source?: string): PartialMovegradeConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error, source);
  }
  return result.data;
}

/**
 * Validate the raw option bag Commander produces
 * @throws ConfigValidationError if an option has the wrong value
 */
export function validateCliOptions(options: Record<string, unknown>): CliOptions {
  const result = cliOptionsSchema.safeParse(options);
  if (!result.success) {
    throw toValidationError(result.error, 'options');
  }

  const { color, ...rest } = result.data;
  const parsed: CliOptions = { ...rest };
  if (color === false) parsed.noColor = true;
  return parsed;
}
