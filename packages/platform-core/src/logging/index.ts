/**
 * Logging Module - Index
 *
 * Exports all logging functionality for platform-core
 */

// Types
export * from './types.js';

// Core logger
export * from './logger.js';

// Formatting utilities
export * from './formatting.js';

// Middleware
export * from './middleware.js';

// Correlation context
export * from './correlation.js';

// Utilities
export * from './utilities.js';

// Error serialization for logging
export * from './error-serializer.js';

// Re-export winston for convenience
import * as winston from 'winston';
export { winston };
