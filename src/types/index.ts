/**
 * Main types export for the Safety Status Hub
 */

// Common types and enums
export * from './common.js';

// User profile groups
export * from './user-profile.js';

// Source configuration types
export * from './sources.js';

// Source report types
export * from './reports.js';

// Dismissal types
export * from './dismissal.js';

// Aggregated view types
export * from './view.js';

// Telemetry event types
export * from './telemetry.js';

// Error handling types
export * from './error-handling.js';
