/**
 * Interfaces export for the Safety Status Hub
 */

export * from './services.js';
export * from './orchestrator.js';
