/**
 * graphvcs configuration and logging foundation
 *
 * Main entry point for the library exports.
 */

// Configuration exports
export * from './config/schema.js';
export * from './config/profiles.js';
export * from './config/config.js';
export * from './config/paths.js';

// Logging exports
export * from './logging/levels.js';
export * from './logging/formatters.js';
export * from './logging/sinks.js';
export * from './logging/registry.js';
export * from './logging/logger.js';

// Errors
export * from './errors.js';

// Version info
export const VERSION = '0.1.0';
