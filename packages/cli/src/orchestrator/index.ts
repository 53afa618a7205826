/**
 * Orchestrator module exports
 */

export type { Services, ServiceHooks } from './services.js';
export { performHealthChecks, initializeServices, closeServices } from './services.js';

export type { GameResult, OrchestrationResult } from './orchestrator.js';
export { orchestrateAnalysis } from './orchestrator.js';
