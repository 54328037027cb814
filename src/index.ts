/**
 * Safety Status Hub
 *
 * Main entry point: aggregates status and issue reports from many sources into
 * one ranked view and coordinates time-bounded refreshes across them
 */

// Export all types
export * from './types/index.js';

// Export all interfaces
export * from './interfaces/index.js';

// Export repository
export * from './repository/index.js';

// Export services
export * from './services/index.js';

// Export orchestrator
export * from './orchestrator/index.js';

// Export shell commands
export * from './cli/index.js';

// Export logging
export { createLogger, setVerboseLogging, isVerboseLoggingEnabled } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
