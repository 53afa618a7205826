/**
 * Build-book command implementation
 */

import * as path from 'node:path';

import { DEFAULT_MAX_BOOK_PLIES, loadBookDatabase } from '@movegrade/database';
import { z } from 'zod';

import { ConfigValidationError } from '../config/validation.js';
import { InputError, handleError } from '../errors/index.js';
import { ProgressReporter } from '../progress/reporter.js';

const buildBookOptionsSchema = z.object({
  output: z.string().min(1),
  maxPlies: z.number().int().min(1).max(60).optional(),
  color: z.boolean().optional(),
});

export type BuildBookOptions = z.infer<typeof buildBookOptionsSchema>;

export function parseBuildBookOptions(options: Record<string, unknown>): BuildBookOptions {
  const result = buildBookOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => ({ path: `options.${issue.path.join('.')}`, message: issue.message })),
    );
  }
  return result.data;
}

/**
 * Import opening lists into a book database
 */
export function buildBookCommand(files: string[], rawOptions: Record<string, unknown>): void {
  const reporter = new ProgressReporter({ color: rawOptions['color'] !== false });

  try {
    const options = parseBuildBookOptions(rawOptions);
    if (files.length === 0) {
      throw new InputError('No opening lists given', 'Pass one or more TSV files with columns eco, name, pgn');
    }

    const dbPath = path.resolve(process.cwd(), options.output);
    reporter.startPhase('parsing');
    const stats = loadBookDatabase({
      sources: files,
      dbPath,
      maxPlies: options.maxPlies ?? DEFAULT_MAX_BOOK_PLIES,
      onWarning: (message) => reporter.warnSafe(message),
    });
    reporter.completePhase('parsing', `${stats.lines} line(s) from ${stats.files} file(s)`);

    if (stats.skipped > 0) {
      reporter.warnSafe(`Skipped ${stats.skipped} line(s)`);
    }
    reporter.printSuccess(`Stored ${stats.positions} position(s)`);
    reporter.printOutputLocation(dbPath);
  } catch (error) {
    reporter.stop();
    handleError(error);
  }
}
