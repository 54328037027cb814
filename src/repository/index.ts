/**
 * Repository exports for the Safety Status Hub
 */

export * from './source-report-store.js';
