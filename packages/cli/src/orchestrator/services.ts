/**
 * Service initialization and health checking
 */

import * as fs from 'node:fs';

import type { BookSource, PositionEvaluator } from '@movegrade/core';
import { BookClient } from '@movegrade/database';
import { UciEvaluator, type EngineError } from '@movegrade/engine';

import type { MovegradeConfig } from '../config/schema.js';
import { createServiceError, resolveAbsolutePath } from '../errors/index.js';
import type { ServiceStatus } from '../progress/reporter.js';

/**
 * Initialized services container
 */
export interface Services {
  evaluator: PositionEvaluator;
  /** Opening book, null when none is configured or the file is missing */
  book: BookSource | null;
}

/**
 * Hooks for reporting problems while services run
 */
export interface ServiceHooks {
  /** Called for every position the engine fails to evaluate */
  onEngineError?: (error: EngineError, fen: string) => void;
  /** Called when a configured book file is missing */
  onWarning?: (message: string) => void;
}

function createEvaluator(config: MovegradeConfig, hooks: ServiceHooks = {}): UciEvaluator {
  return new UciEvaluator(
    {
      path: config.engine.path,
      threads: config.engine.threads,
      hashMb: config.engine.hashMb,
      timeoutMs: config.engine.timeoutMs,
    },
    { onError: hooks.onEngineError },
  );
}

/**
 * Check that the engine starts and answers the UCI handshake
 */
async function checkEngine(evaluator: UciEvaluator): Promise<ServiceStatus> {
  const health = await evaluator.healthCheck();
  const status: ServiceStatus = {
    name: `Engine (${evaluator.enginePath})`,
    healthy: health.healthy,
    latencyMs: health.latencyMs,
  };
  if (health.name) status.detail = health.name;
  if (health.error) status.error = health.error;
  return status;
}

/**
 * Check if the book database exists
 */
function checkBook(bookPath: string): ServiceStatus {
  const absolutePath = resolveAbsolutePath(bookPath);
  if (fs.existsSync(absolutePath)) {
    return { name: 'Opening book', healthy: true, detail: absolutePath };
  }
  return { name: 'Opening book', healthy: false, error: `file not found: ${absolutePath}` };
}

/**
 * Perform all health checks
 */
export async function performHealthChecks(config: MovegradeConfig): Promise<ServiceStatus[]> {
  const results: ServiceStatus[] = [await checkEngine(createEvaluator(config))];

  if (config.book.path) {
    results.push(checkBook(config.book.path));
  }

  return results;
}

/**
 * Initialize all services based on config
 *
 * @throws ServiceError if the engine cannot be started
 */
export async function initializeServices(config: MovegradeConfig, hooks: ServiceHooks = {}): Promise<Services> {
  const evaluator = createEvaluator(config, hooks);
  const health = await evaluator.healthCheck();
  if (!health.healthy) {
    throw createServiceError(
      'Engine',
      `Cannot start ${evaluator.enginePath}`,
      health.error !== undefined ? new Error(health.error) : undefined,
    );
  }

  // A missing book downgrades to "no book moves" rather than failing the run
  let book: BookClient | null = null;
  if (config.book.path) {
    const absolutePath = resolveAbsolutePath(config.book.path);
    if (fs.existsSync(absolutePath)) {
      book = new BookClient({ dbPath: absolutePath });
    } else {
      hooks.onWarning?.(`Opening book not found at ${absolutePath}; no move will be marked as book`);
    }
  }

  return { evaluator, book };
}

/**
 * Close all service connections
 */
export function closeServices(services: Services): void {
  if (services.book instanceof BookClient) {
    services.book.close();
  }
}
