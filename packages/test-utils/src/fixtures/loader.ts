/**
 * Fixture loading utilities for tests
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Get the absolute path to a fixture file under fixtures/games
 */
export function getFixturePath(relativePath: string): string {
  return path.join(__dirname, 'games', relativePath);
}

/**
 * Load a PGN fixture file
 */
export async function loadPgn(relativePath: string): Promise<string> {
  return fs.promises.readFile(getFixturePath(relativePath), 'utf-8');
}

/**
 * Load a PGN fixture file synchronously
 */
export function loadPgnSync(relativePath: string): string {
  return fs.readFileSync(getFixturePath(relativePath), 'utf-8');
}

/**
 * Check if a fixture exists
 */
export function fixtureExists(relativePath: string): boolean {
  return fs.existsSync(getFixturePath(relativePath));
}
