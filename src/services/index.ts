/**
 * Service exports for the Safety Status Hub
 */

export * from './hub-config.js';
export * from './status-strings.js';
export * from './source-registry.js';
export * from './source-data-validator.js';
export * from './action-resolver.js';
export * from './issue-dismissal-cache.js';
export * from './telemetry-logger.js';
export * from './critical-section.js';
export * from './refresh-coordinator.js';
export * from './aggregation-engine.js';
