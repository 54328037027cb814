/**
 * Orchestrator exports for the Safety Status Hub
 */

export * from './safety-hub-orchestrator.js';
