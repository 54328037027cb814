/**
 * Shell exports for the Safety Status Hub
 */

export * from './shell-command-handler.js';
