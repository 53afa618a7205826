/**
 * @movegrade/test-utils
 *
 * Shared test utilities for the analysis packages
 */

// Fixture loading
export { loadPgn, loadPgnSync, getFixturePath, fixtureExists } from './fixtures/loader.js';

// Test doubles
export {
  createMockEngine,
  createMockBook,
  DEFAULT_ENGINE_RECORD,
  type MockEngine,
  type MockBook,
  type MockEngineConfig,
} from './mocks/mock-engine.js';

// Builders
export { GameAnalysisBuilder, gameAnalysis, analysisEntry } from './builders/game-analysis-builder.js';

// Analysis assertions
export { assertMoveQualities, assertQualityCount, assertValidAnalysis } from './assertions/analysis-assertions.js';
